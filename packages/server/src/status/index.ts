/**
 * Status reporting
 * @module @kuberoute/server/status
 */

export * from './s3-reporter.js';
