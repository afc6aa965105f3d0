/**
 * Shared TypeScript types for the monorepo
 *
 * This module provides:
 * - Workspace identity types and change notifications
 * - Diagnostic and snapshot shapes
 * - Scheduling and background status types
 */

export * from './workspace.js';
export * from './diagnostics.js';
