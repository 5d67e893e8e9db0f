// SPDX-License-Identifier: Apache-2.0

import {
  type DefaultRenderer,
  type Listr,
  type ListrTask,
  type ListrTaskWrapper,
  type SimpleRenderer,
} from 'listr2';

export type DeployListrTask<T> = ListrTask<T, typeof DefaultRenderer, typeof SimpleRenderer>;

export type DeployListrTaskWrapper<T> = ListrTaskWrapper<T, typeof DefaultRenderer, typeof SimpleRenderer>;

export type DeployListr<T> = Listr<T, 'default', 'simple'>;

export type Optional<T> = T | undefined;
