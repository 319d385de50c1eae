/**
 * Sampling Loop Component
 *
 * Background temperature and power sampling.
 */

export * from './sampling-loop.js';
