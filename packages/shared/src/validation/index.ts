/**
 * Validation for kuberoute
 * @module @kuberoute/shared/validation
 */

export { validateConfig, isRecord } from './config-validation.js';
