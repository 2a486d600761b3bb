/**
 * connect() - validate options and assemble a Connection
 */

import { createAuthStrategy } from './auth/index.js';
import { Connection } from './connection.js';
import { LogLevel, StructuredLogger, type ConnectorLogger } from './logging/logger.js';
import { resolveTransport } from './transports/registry.js';
import { validateConfig, type ConnectOptions, type ResolvedConfig } from './types/index.js';

const LOG_LEVELS: Record<ResolvedConfig['logLevel'], LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Open a connection. No network call happens here; the first query
 * authenticates.
 *
 * @throws {@link MissingRequiredFieldError} when a required option is absent
 * @throws {@link InvalidConfigError} for invalid options or an unknown transport
 */
export function connect(options: ConnectOptions): Connection {
  const config = validateConfig(options);
  const logger: ConnectorLogger =
    options.logger ?? new StructuredLogger(LOG_LEVELS[config.logLevel]);
  const fetchFn = options.fetch ?? globalThis.fetch;

  // Unknown names fail here, before anything is built.
  const factory = resolveTransport(config.transport);

  const auth = createAuthStrategy(config.credentials, {
    fetch: fetchFn,
    logger,
    requestTimeoutMs: config.requestTimeoutMs,
    refreshBufferMs: config.refreshBufferMs,
    tokenLifetimeSeconds: config.tokenLifetimeSeconds,
    dataspace: config.dataspace,
  });

  const transport = factory({
    auth,
    logger,
    fetch: fetchFn,
    apiVersion: config.apiVersion,
    requestTimeoutMs: config.requestTimeoutMs,
    dataspace: config.dataspace,
    grpcEndpoint: config.grpcEndpoint,
  });

  logger.info('Connection opened', {
    component: 'connection',
    transport: transport.name,
    operation: config.credentials.grantType,
  });

  return new Connection({
    auth,
    transport,
    logger,
    pageSize: config.pageSize,
    poll: config.poll,
  });
}
