export { TransportError, splitLines, createFetchTransport } from './transport.js';
export type { StreamTransport, StreamConnection, StreamOpenOptions } from './transport.js';
