#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import {container} from 'tsyringe-neo';
import * as cli from './src/index.js';
import {type DeployLogger} from './src/core/logging/deploy-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: DeployLogger} = {};
await cli
  .main(process.argv, context)
  .then(exitCode => {
    context.logger?.info(`magma-deploy completed with exit code ${exitCode}, via entrypoint`);
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const errorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    process.exitCode = errorHandler.handle(error);
  });
