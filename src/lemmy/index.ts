/**
 * Lemmy entrypoint: request forms, response schemas and their inferred types, tracking Lemmy 0.19.5.
 * @module
 */
export * from './aggregates.js';
export * from './endpoints.js';
export * from './enums.js';
export * from './error.js';
export type * from './forms.js';
export * from './responses.js';
export * from './source.js';
export * from './views.js';
