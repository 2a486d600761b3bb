/**
 * Transport registry - name → factory
 */

import { InvalidConfigError } from '../errors/index.js';
import { DEFAULT_TRANSPORT } from '../types/index.js';
import { GrpcTransport } from './grpc-transport.js';
import { RestTransport } from './rest-transport.js';
import type { TransportClient, TransportContext } from './transport.js';

export type TransportFactory = (context: TransportContext) => TransportClient;

const BUILT_IN: ReadonlyMap<string, TransportFactory> = new Map<string, TransportFactory>([
  ['rest', (context) => RestTransport.create(context)],
  ['grpc', (context) => GrpcTransport.create(context)],
]);

const registry = new Map<string, TransportFactory>(BUILT_IN);

/**
 * Register an additional transport. Registering an existing name replaces
 * its factory.
 */
export function registerTransport(name: string, factory: TransportFactory): void {
  if (name.trim().length === 0) {
    throw new InvalidConfigError('Transport name must not be empty');
  }
  registry.set(name, factory);
}

/**
 * Remove a registered transport, restoring the built-in of the same name if
 * there is one.
 */
export function unregisterTransport(name: string): void {
  const builtIn = BUILT_IN.get(name);
  if (builtIn) {
    registry.set(name, builtIn);
  } else {
    registry.delete(name);
  }
}

export function availableTransports(): string[] {
  return [...registry.keys()].sort();
}

/**
 * Look up a transport factory by name.
 *
 * @throws {@link InvalidConfigError} for unknown names
 */
export function resolveTransport(name: string = DEFAULT_TRANSPORT): TransportFactory {
  const factory = registry.get(name);
  if (!factory) {
    throw new InvalidConfigError(
      `Unknown transport "${name}". Available: ${availableTransports().join(', ')}`
    );
  }
  return factory;
}
