/**
 * Centralized Configuration Defaults
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  wait: 600000, // 10 minutes
  command: 120000, // 2 minutes
  logs: 30000, // 30 seconds
  killGrace: 5000, // SIGTERM to SIGKILL
} as const;

/**
 * Managed-build polling bounds
 */
export const DEFAULT_POLLING = {
  interval: 5000,
  minInterval: 2000,
  maxInterval: 10000,
} as const;

export const DEFAULT_BINARIES = {
  kubectl: 'kubectl',
  gcloud: 'gcloud',
  tkn: 'tkn',
  yq: 'yq',
} as const;

export const DEFAULT_MANAGED = {
  region: 'us-central1',
  runPrefix: 'catalog-test-',
} as const;

export const DEFAULT_EXPECTED_CONDITION = 'Succeeded';

/**
 * Tekton API coordinates used for watches and gets
 */
export const TEKTON_API = {
  group: 'tekton.dev',
  version: 'v1',
} as const;
