/**
 * Stores for kuberoute core
 * @module @kuberoute/core/stores
 */

export { FallbackCache, createFallbackCache } from './fallback-cache.js';
