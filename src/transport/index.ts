export { FetchTransport, type FetchTransportOptions } from './fetch-transport.js';
export { TransportTimeoutError, type HttpRequest, type HttpResponse, type Transport } from './types.js';
