/**
 * Shared Components
 * Base classes, interfaces, and utilities used by every component
 */

export * from './base';
export * from './interfaces';
export * from './utils/logging';
export * from './utils/error-handling';
export * from './utils/gcp-provider';
