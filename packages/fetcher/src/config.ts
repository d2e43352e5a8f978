import { z } from 'zod';

const booleanFromEnvSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const integerFromEnv = (name: string, min: number) =>
  z.preprocess(
    (value) => {
      if (typeof value === 'string') {
        const parsedValue = Number(value.trim());
        return Number.isFinite(parsedValue) ? parsedValue : value;
      }

      return value;
    },
    z
      .number({ invalid_type_error: `Invalid ${name}. Provide a number.` })
      .int(`Invalid ${name}. Provide an integer.`)
      .min(min, `Invalid ${name}. Provide an integer >= ${min}.`),
  );

const fetcherOptionsSchema = z.object({
  timeoutMs: z.number().int().positive().default(10_000),
  numRetries: z.number().int().min(0).default(0),
  retryDelayMs: z.number().int().min(0).default(1_000),
  serviceName: z.string().min(1).default('api'),
  skipRetries: z.boolean().default(false),
  caFile: z.string().min(1).optional(),
  keepAliveTimeoutMs: z.number().int().positive().default(15_000),
  maxSockets: z.number().int().positive().default(100),
});

type FetcherSettings = z.infer<typeof fetcherOptionsSchema>;
type FetcherSettingsInput = z.input<typeof fetcherOptionsSchema>;

const envSchema = z.object({
  FETCHER_TIMEOUT_MS: integerFromEnv('FETCHER_TIMEOUT_MS', 1).optional(),
  FETCHER_NUM_RETRIES: integerFromEnv('FETCHER_NUM_RETRIES', 0).optional(),
  FETCHER_RETRY_DELAY_MS: integerFromEnv('FETCHER_RETRY_DELAY_MS', 0).optional(),
  FETCHER_SERVICE_NAME: z.string().trim().min(1).optional(),
  FETCHER_CA_FILE: z.string().trim().min(1).optional(),
  FETCHER_KEEPALIVE_TIMEOUT_MS: integerFromEnv(
    'FETCHER_KEEPALIVE_TIMEOUT_MS',
    1,
  ).optional(),
  FETCHER_DEBUG: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      booleanFromEnvSchema,
    )
    .optional(),
});

/**
 * Fills in defaults and validates orchestrator settings.
 *
 * @throws ZodError on invalid values
 */
function resolveFetcherSettings(input: FetcherSettingsInput = {}): FetcherSettings {
  return fetcherOptionsSchema.parse(input);
}

/**
 * Reads orchestrator settings from `FETCHER_*` variables. Unset variables
 * are left out so later sources can supply them. `FETCHER_DEBUG=true`
 * turns retries off.
 *
 * @throws ZodError on malformed values
 */
function fetcherOptionsFromEnv(
  env: Record<string, string | undefined>,
): FetcherSettingsInput {
  const parsed = envSchema.parse(env);
  const settings: FetcherSettingsInput = {};

  if (parsed.FETCHER_TIMEOUT_MS !== undefined) {
    settings.timeoutMs = parsed.FETCHER_TIMEOUT_MS;
  }
  if (parsed.FETCHER_NUM_RETRIES !== undefined) {
    settings.numRetries = parsed.FETCHER_NUM_RETRIES;
  }
  if (parsed.FETCHER_RETRY_DELAY_MS !== undefined) {
    settings.retryDelayMs = parsed.FETCHER_RETRY_DELAY_MS;
  }
  if (parsed.FETCHER_SERVICE_NAME !== undefined) {
    settings.serviceName = parsed.FETCHER_SERVICE_NAME;
  }
  if (parsed.FETCHER_CA_FILE !== undefined) {
    settings.caFile = parsed.FETCHER_CA_FILE;
  }
  if (parsed.FETCHER_KEEPALIVE_TIMEOUT_MS !== undefined) {
    settings.keepAliveTimeoutMs = parsed.FETCHER_KEEPALIVE_TIMEOUT_MS;
  }
  if (parsed.FETCHER_DEBUG !== undefined) {
    settings.skipRetries = parsed.FETCHER_DEBUG;
  }

  return settings;
}

export { fetcherOptionsFromEnv, fetcherOptionsSchema, resolveFetcherSettings };
export type { FetcherSettings, FetcherSettingsInput };
