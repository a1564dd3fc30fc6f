/**
 * kuberoute Core Package
 * Reconciliation engine: planning, quota evaluation, fallback cache and the cycle
 * @module @kuberoute/core
 */

export * from './services/index.js';

export * from './stores/index.js';
