/**
 * Automation API for stack deployment
 */

export { DeploymentOrchestrator, buildStackConfig, countPendingChanges } from './deployment-orchestrator';
export type { ManagedStack, StackResolver } from './deployment-orchestrator';
export { ConfigManager, REQUIRED_STACK_SETTINGS } from './config-manager';
export * from './types';
