/**
 * Core Utilities Module
 *
 * Shared utilities for error handling, logging, cancellation, and validation.
 */

export * from './errors.js';
export * from './logger.js';
export * from './cancellation.js';
export * from './validation.js';
