/**
 * Fetch entrypoint: exports the fetch transport and its options.
 * @module
 */
export { FetchTransport, type FetchTransportOptions } from './client.js';
