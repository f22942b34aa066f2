/**
 * Harness Configuration
 *
 * Built once at process start from the environment (and CLI overrides),
 * validated with Zod, then passed explicitly to every component.
 */

import { z } from 'zod';
import {
  DEFAULT_BINARIES,
  DEFAULT_EXPECTED_CONDITION,
  DEFAULT_MANAGED,
  DEFAULT_POLLING,
  DEFAULT_TIMEOUTS,
} from './defaults';
import { ConfigurationError } from '../lib/errors';

const ModeSchema = z.enum(['direct', 'managed']).default('direct');
const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');
const WaitMethodSchema = z.enum(['watch', 'kubectl']).default('watch');

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const HarnessConfigSchema = z
  .object({
    mode: ModeSchema,
    kubeconfig: z.string().min(1).optional(),
    logging: z.object({
      level: LogLevelSchema,
      pretty: booleanFlag(false),
    }),
    timeouts: z.object({
      waitMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.wait),
      commandMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.command),
    }),
    direct: z.object({
      waitMethod: WaitMethodSchema,
      expectedCondition: z.string().min(1).default(DEFAULT_EXPECTED_CONDITION),
    }),
    managed: z.object({
      project: z.string().min(1).optional(),
      region: z.string().min(1).default(DEFAULT_MANAGED.region),
      bundleRegistry: z.string().min(1).optional(),
      serviceAccount: z.string().min(1).optional(),
      runPrefix: z
        .string()
        .regex(/^[a-z]([-a-z0-9]*)?$/, 'must be a lower-case DNS label prefix')
        .default(DEFAULT_MANAGED.runPrefix),
      pollIntervalMs: z.coerce
        .number()
        .int()
        .min(DEFAULT_POLLING.minInterval)
        .max(DEFAULT_POLLING.maxInterval)
        .default(DEFAULT_POLLING.interval),
    }),
    binaries: z.object({
      kubectl: z.string().min(1).default(DEFAULT_BINARIES.kubectl),
      gcloud: z.string().min(1).default(DEFAULT_BINARIES.gcloud),
      tkn: z.string().min(1).default(DEFAULT_BINARIES.tkn),
      yq: z.string().min(1).default(DEFAULT_BINARIES.yq),
    }),
    fixtures: z.object({
      suffixNames: booleanFlag(true),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.mode !== 'managed') return;
    for (const key of ['project', 'bundleRegistry', 'serviceAccount'] as const) {
      if (!config.managed[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['managed', key],
          message: `managed.${key} is required in managed mode`,
        });
      }
    }
  });

export type HarnessConfig = Readonly<z.infer<typeof HarnessConfigSchema>>;

/**
 * Values the CLI may override on top of the environment
 */
export interface ConfigOverrides {
  mode?: string;
  kubeconfig?: string;
  logLevel?: string;
  waitTimeoutMs?: string;
  expectedCondition?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Treat empty environment variables as unset
 */
function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): HarnessConfig {
  const rawConfig = {
    mode: overrides.mode ?? read(env, 'CATALOG_E2E_MODE'),
    kubeconfig: overrides.kubeconfig ?? read(env, 'KUBECONFIG'),
    logging: {
      level: overrides.logLevel ?? read(env, 'LOG_LEVEL'),
      pretty: read(env, 'LOG_PRETTY'),
    },
    timeouts: {
      waitMs: overrides.waitTimeoutMs ?? read(env, 'CATALOG_E2E_WAIT_TIMEOUT_MS'),
      commandMs: read(env, 'CATALOG_E2E_COMMAND_TIMEOUT_MS'),
    },
    direct: {
      waitMethod: read(env, 'CATALOG_E2E_WAIT_METHOD'),
      expectedCondition:
        overrides.expectedCondition ?? read(env, 'CATALOG_E2E_EXPECTED_CONDITION'),
    },
    managed: {
      project: read(env, 'CATALOG_E2E_PROJECT'),
      region: read(env, 'CATALOG_E2E_REGION'),
      bundleRegistry: read(env, 'CATALOG_E2E_BUNDLE_REGISTRY'),
      serviceAccount: read(env, 'CATALOG_E2E_SERVICE_ACCOUNT'),
      runPrefix: read(env, 'CATALOG_E2E_RUN_PREFIX'),
      pollIntervalMs: read(env, 'CATALOG_E2E_POLL_INTERVAL_MS'),
    },
    binaries: {
      kubectl: read(env, 'KUBECTL_BIN'),
      gcloud: read(env, 'GCLOUD_BIN'),
      tkn: read(env, 'TKN_BIN'),
      yq: read(env, 'YQ_BIN'),
    },
    fixtures: {
      suffixNames: read(env, 'CATALOG_E2E_SUFFIX_NAMES'),
    },
  };

  const result = HarnessConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, {
      issues,
    });
  }

  return Object.freeze(result.data);
}
