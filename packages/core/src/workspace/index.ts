/**
 * Workspace Module
 */

export * from './types.js';
export { InMemoryWorkspace, type ProjectInit, type DocumentInit } from './in-memory-workspace.js';
