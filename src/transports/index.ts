/**
 * Transport exports
 */

export { BaseTransport, type TransportClient, type TransportContext } from './transport.js';
export { RestTransport, type RestTransportOptions } from './rest-transport.js';
export {
  GrpcTransport,
  createDefaultStub,
  QUERY_SERVICE_NAME,
  PROTO_PATH,
  type GrpcTransportOptions,
  type GrpcQueryStub,
  type GrpcStubFactory,
  type GrpcMethod,
} from './grpc-transport.js';
export {
  registerTransport,
  unregisterTransport,
  availableTransports,
  resolveTransport,
  type TransportFactory,
} from './registry.js';
export { mapPhase } from './wire.js';
