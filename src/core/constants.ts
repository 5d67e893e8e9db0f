// SPDX-License-Identifier: Apache-2.0

import {color, type ListrLogger, PRESET_TIMER} from 'listr2';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- tool home ----------------------------------------------------------------------------------
export const MAGMA_DEPLOY_HOME_DIR = process.env.MAGMA_DEPLOY_HOME || PathEx.join(os.homedir(), '.magma-deploy');
export const MAGMA_DEPLOY_LOG_FILE = 'magma-deploy.log';
export const DEFAULT_CONFIG_FILE = 'magma_config.env';
export const LOCK_FILE = 'magma-deploy.lock';
export const LOG_LEVEL = process.env.MAGMA_DEPLOY_LOG_LEVEL || 'debug';

// -------------------- managed stack ------------------------------------------------------------------------------
export const MAGMA_CHART_REPO_NAME = 'magma';
export const MAGMA_CHART_REPO_URL = 'https://magma.github.io/magma/helm-charts';
export const ORC8R_RELEASE_NAME = 'orc8r';
export const ORC8R_CHART = `${MAGMA_CHART_REPO_NAME}/orc8r`;
export const NMS_RELEASE_NAME = 'nms';
export const NMS_CHART = `${MAGMA_CHART_REPO_NAME}/nms`;
export const NMS_PORT = 8080;
export const POSTGRESQL_RELEASE_NAME = 'postgresql';
export const POSTGRESQL_CHART = 'oci://registry-1.docker.io/bitnamicharts/postgresql';
export const POSTGRESQL_POD_LABEL = 'app.kubernetes.io/name=postgresql';
export const MAGMA_IMAGE_REGISTRY = 'magma';
export const MAGMA_IMAGE_TAG = process.env.MAGMA_IMAGE_TAG || 'latest';
export const COMPOSE_FILE = 'docker-compose.yml';
export const MOBILITY_IP_POOL = '192.168.128.0/24';
export const RESOURCE_NAME_MARKER = 'magma';
export const MANAGED_HELM_RELEASES: readonly string[] = [ORC8R_RELEASE_NAME, NMS_RELEASE_NAME, POSTGRESQL_RELEASE_NAME];
export const SYSTEM_DIRECTORIES: readonly string[] = ['/etc/magma', '/var/log/magma', '/opt/magma/certs'];

// -------------------- defaults -----------------------------------------------------------------------------------
export const DEFAULT_DOMAIN = 'magma.local';
export const DEFAULT_NAMESPACE = 'magma';
export const READINESS_TIMEOUT_SECONDS = Number(process.env.MAGMA_DEPLOY_READINESS_TIMEOUT_SECONDS) || 300;
export const READINESS_POLL_INTERVAL_MILLIS = 2000;
export const ADAPTER_MAX_ATTEMPTS = Number(process.env.MAGMA_DEPLOY_ADAPTER_MAX_ATTEMPTS) || 3;
export const ADAPTER_RETRY_DELAY_SECONDS = 5;
export const LOCK_ACQUIRE_ATTEMPTS = Number(process.env.MAGMA_DEPLOY_LOCK_ACQUIRE_ATTEMPTS) || 10;
export const LOCK_RETRY_DELAY_SECONDS = 2;
export const CERTIFICATE_VALIDITY_DAYS = 365;

// -------------------- status thresholds --------------------------------------------------------------------------
export const MIN_TOTAL_MEMORY_MB = 8192;
export const MIN_AVAILABLE_MEMORY_MB = 4096;
export const MIN_CPU_COUNT = 4;
export const MAX_DISK_USAGE_PERCENT = 80;

/**
 * Listr related
 * @returns a object that defines the default color options
 */
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number) => duration > 100,
  format: (duration: number) => {
    if (duration > 30_000) {
      return color.red;
    }

    return color.green;
  },
};

export const LISTR_DEFAULT_RENDERER_OPTION: {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  logger?: ListrLogger;
} = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};
