/**
 * Components for the public dataset stacks
 */

// Shared components
export * from './shared';

// Google Cloud components
export * from './gcp';

// Public dataset compositions
export * from './datasets';
