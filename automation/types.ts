import { OpMap } from "@pulumi/pulumi/automation";

/**
 * Configuration types for stack deployment automation
 */

export interface StackConfig {
    name: string;
    workDir: string;
    /** Pulumi stack name; defaults to `name` */
    stackName?: string;
    /** Config namespace the program reads; defaults to the program's project name */
    configNamespace?: string;
    description?: string;
    /** Program settings, written as `<namespace>:<key>` */
    config: Record<string, unknown>;
    labels?: Record<string, string>;
    /** Stack outputs that must hold exactly these values after an update */
    expectedOutputs?: Record<string, string>;
}

export interface DeploymentOptions {
    parallel?: boolean;
    dryRun?: boolean;
    refresh?: boolean;
    continueOnFailure?: boolean;
    /** Run a second preview after the update and fail on any pending change */
    verifyIdempotency?: boolean;
    /** Run the governance policy pack with preview and update (default true) */
    enforcePolicies?: boolean;
}

export interface DeploymentConfig {
    name: string;
    description?: string;
    defaultLabels?: Record<string, string>;
    stacks: StackConfig[];
    deploymentOptions?: DeploymentOptions;
}

export interface DeploymentResult {
    stackName: string;
    success: boolean;
    outputs?: Record<string, unknown>;
    /** Pending changes by operation, from a preview */
    changeSummary?: OpMap;
    error?: string;
    duration?: number;
    retryCount?: number;
}

export interface DeploymentSummary {
    deploymentName: string;
    totalStacks: number;
    successfulStacks: number;
    failedStacks: number;
    results: DeploymentResult[];
    totalDuration: number;
}
