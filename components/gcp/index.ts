/**
 * Google Cloud Components
 */

export * from './bigquery';
export * from './storage';
