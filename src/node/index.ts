/**
 * Node entrypoint: exports the pooled axios transport for Node.js.
 * @module
 */
export { NodeTransport, type NodeTransportOptions } from './client.js';
