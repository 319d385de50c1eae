/**
 * Collector Configuration Component
 */

export * from './configuration.js';
