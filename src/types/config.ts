/**
 * Connection options and their validation.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { InvalidConfigError, MissingRequiredFieldError } from '../errors/index.js';
import type { ConnectorLogger } from '../logging/logger.js';
import type { Credentials } from './credentials.js';

/** Transport used when `transport` is not set. */
export const DEFAULT_TRANSPORT = 'rest';

/** REST API version segment used when `apiVersion` is not set. */
export const DEFAULT_API_VERSION = 'v61.0';

const nonEmpty = z.string().min(1);

const credentialsSchema = z.discriminatedUnion('grantType', [
  z.object({
    grantType: z.literal('password'),
    clientId: nonEmpty,
    clientSecret: nonEmpty,
    username: nonEmpty,
    password: nonEmpty,
  }),
  z.object({
    grantType: z.literal('refresh_token'),
    clientId: nonEmpty,
    clientSecret: nonEmpty,
    refreshToken: nonEmpty,
    coreToken: nonEmpty.optional(),
  }),
  z.object({
    grantType: z.literal('jwt_bearer'),
    clientId: nonEmpty,
    username: nonEmpty,
    privateKey: nonEmpty,
  }),
]);

const pollSchema = z
  .object({
    initialIntervalMs: z.number().int().nonnegative().default(250),
    maxIntervalMs: z.number().int().nonnegative().default(5_000),
    backoffMultiplier: z.number().min(1).default(2),
    maxAttempts: z.number().int().positive().default(120),
    timeoutMs: z.number().int().positive().default(300_000),
  })
  .refine((poll) => poll.maxIntervalMs >= poll.initialIntervalMs, {
    message: 'maxIntervalMs must be >= initialIntervalMs',
    path: ['maxIntervalMs'],
  });

export const connectOptionsSchema = z.object({
  loginUrl: z.string().url(),
  credentials: credentialsSchema,
  transport: nonEmpty.default(DEFAULT_TRANSPORT),
  apiVersion: nonEmpty.default(DEFAULT_API_VERSION),
  dataspace: nonEmpty.optional(),
  grpcEndpoint: nonEmpty.optional(),
  pageSize: z.number().int().positive().max(100_000).default(1_000),
  poll: pollSchema.default({}),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  refreshBufferMs: z.number().int().nonnegative().default(60_000),
  tokenLifetimeSeconds: z.number().int().positive().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type PollOptions = z.output<typeof pollSchema>;

/**
 * Collaborators that cannot be described as data.
 */
export interface ConnectCollaborators {
  /** Logger to use instead of the built-in structured logger */
  readonly logger?: ConnectorLogger | undefined;
  /** fetch implementation (default: global fetch) */
  readonly fetch?: typeof fetch | undefined;
}

/**
 * Options accepted by `connect()`.
 *
 * @example
 * ```typescript
 * const connection = connect({
 *   loginUrl: 'https://login.example.com',
 *   credentials: {
 *     grantType: 'password',
 *     clientId: 'my-client-id',
 *     clientSecret: 'test-secret',
 *     username: 'analyst@example.com',
 *     password: 'test-password',
 *   },
 *   transport: 'rest',
 *   pageSize: 500,
 *   poll: { initialIntervalMs: 200, maxIntervalMs: 2_000 },
 * });
 * ```
 */
export type ConnectOptions = z.input<typeof connectOptionsSchema> & ConnectCollaborators;

/**
 * Options after validation, with defaults applied and `loginUrl` folded into
 * the credentials.
 */
export type ResolvedConfig = Omit<z.output<typeof connectOptionsSchema>, 'credentials'> & {
  readonly credentials: Credentials;
};

function toConfigError(error: z.ZodError): MissingRequiredFieldError | InvalidConfigError {
  const issue = error.issues[0];
  if (issue === undefined) {
    return new InvalidConfigError('Invalid configuration', { cause: error });
  }
  const field = issue.path.join('.');
  const missing =
    (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') ||
    (issue.code === z.ZodIssueCode.too_small && issue.type === 'string' && issue.minimum === 1);
  if (missing && field.length > 0) {
    return new MissingRequiredFieldError(field, { cause: error });
  }
  return new InvalidConfigError(field ? `${field}: ${issue.message}` : issue.message, {
    cause: error,
  });
}

/**
 * Validate connection options and apply defaults.
 *
 * @throws {@link MissingRequiredFieldError} when a required field is absent or empty
 * @throws {@link InvalidConfigError} for any other invalid value
 */
export function validateConfig(options: unknown): ResolvedConfig {
  const parsed = connectOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toConfigError(parsed.error);
  }
  const { credentials, ...rest } = parsed.data;
  const loginUrl = rest.loginUrl.replace(/\/+$/, '');
  return {
    ...rest,
    loginUrl,
    credentials: { ...credentials, loginUrl },
  };
}

/**
 * Build options from environment variables. The caller decides which
 * environment to pass; nothing reads `process.env` implicitly.
 *
 * The grant type follows `DATAQUERY_GRANT_TYPE` when set, otherwise the
 * first complete credential set among private key, refresh token and
 * password.
 */
export function connectOptionsFromEnv(env: Readonly<Record<string, string | undefined>>): ConnectOptions {
  const clientId = env.DATAQUERY_CLIENT_ID ?? '';
  const grantType =
    env.DATAQUERY_GRANT_TYPE ??
    (env.DATAQUERY_PRIVATE_KEY
      ? 'jwt_bearer'
      : env.DATAQUERY_REFRESH_TOKEN
        ? 'refresh_token'
        : 'password');

  let credentials: ConnectOptions['credentials'];
  switch (grantType) {
    case 'jwt_bearer':
      credentials = {
        grantType,
        clientId,
        username: env.DATAQUERY_USERNAME ?? '',
        privateKey: env.DATAQUERY_PRIVATE_KEY ?? '',
      };
      break;
    case 'refresh_token':
      credentials = {
        grantType,
        clientId,
        clientSecret: env.DATAQUERY_CLIENT_SECRET ?? '',
        refreshToken: env.DATAQUERY_REFRESH_TOKEN ?? '',
        ...(env.DATAQUERY_CORE_TOKEN !== undefined && { coreToken: env.DATAQUERY_CORE_TOKEN }),
      };
      break;
    case 'password':
      credentials = {
        grantType,
        clientId,
        clientSecret: env.DATAQUERY_CLIENT_SECRET ?? '',
        username: env.DATAQUERY_USERNAME ?? '',
        password: env.DATAQUERY_PASSWORD ?? '',
      };
      break;
    default:
      throw new InvalidConfigError(`Unsupported grant type: ${grantType}`);
  }

  const options: ConnectOptions = {
    loginUrl: env.DATAQUERY_LOGIN_URL ?? '',
    credentials,
    ...(env.DATAQUERY_TRANSPORT !== undefined && { transport: env.DATAQUERY_TRANSPORT }),
    ...(env.DATAQUERY_DATASPACE !== undefined && { dataspace: env.DATAQUERY_DATASPACE }),
    ...(env.DATAQUERY_PAGE_SIZE !== undefined && {
      pageSize: parseInt(env.DATAQUERY_PAGE_SIZE, 10),
    }),
  };

  const logLevel = env.DATAQUERY_LOG_LEVEL;
  if (logLevel !== undefined) {
    const level = connectOptionsSchema.shape.logLevel.safeParse(logLevel);
    if (!level.success) {
      throw new InvalidConfigError(`Unsupported log level: ${logLevel}`);
    }
    return { ...options, logLevel: level.data };
  }
  return options;
}
