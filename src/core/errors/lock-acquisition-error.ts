// SPDX-License-Identifier: Apache-2.0

import {DeployError} from './deploy-error.js';

export class LockAcquisitionError extends DeployError {}
