import * as automation from "@pulumi/pulumi/automation";
import * as fs from 'fs';
import * as path from 'path';
import {
    DeploymentConfig,
    DeploymentOptions,
    DeploymentResult,
    DeploymentSummary,
    StackConfig
} from './types';
import { DeploymentLogger, PerformanceMonitor } from '../components/shared/utils/logging';
import {
    ComponentError,
    ErrorHandler,
    RecoveryOptions,
    RecoveryStrategy
} from '../components/shared/utils/error-handling';

/**
 * Config namespace of the America Health Rankings program (its Pulumi project name)
 */
export const DEFAULT_CONFIG_NAMESPACE = 'america-health-rankings';

/**
 * The policy pack runs from its TypeScript sources, so look for the nearest
 * `policies/PulumiPolicy.yaml` above this file (also when running from dist/).
 */
function findPolicyPackDir(start: string): string {
    let dir = start;
    for (;;) {
        const candidate = path.join(dir, 'policies');
        if (fs.existsSync(path.join(candidate, 'PulumiPolicy.yaml'))) {
            return candidate;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return path.resolve(start, '..', 'policies');
        }
        dir = parent;
    }
}

export const POLICY_PACK_DIR = findPolicyPackDir(__dirname);

/**
 * The slice of an Automation API stack the orchestrator drives
 */
export interface ManagedStack {
    setAllConfig(config: automation.ConfigMap): Promise<void>;
    refresh(opts?: automation.RefreshOptions): Promise<unknown>;
    up(opts?: automation.UpOptions): Promise<{ outputs: automation.OutputMap }>;
    preview(opts?: automation.PreviewOptions): Promise<{ changeSummary: automation.OpMap }>;
    destroy(opts?: automation.DestroyOptions): Promise<unknown>;
}

export type StackResolver = (args: { stackName: string; workDir: string }) => Promise<ManagedStack>;

const selectLocalStack: StackResolver = args => automation.LocalWorkspace.createOrSelectStack(args);

/**
 * Build the stack configuration written before each operation:
 * every setting under `<namespace>:`, objects as JSON, and `gcp:project`.
 */
export function buildStackConfig(stackConfig: StackConfig): automation.ConfigMap {
    const namespace = stackConfig.configNamespace ?? DEFAULT_CONFIG_NAMESPACE;
    const configValues: automation.ConfigMap = {};

    for (const [key, value] of Object.entries(stackConfig.config)) {
        if (value === undefined || value === null) {
            continue;
        }
        configValues[`${namespace}:${key}`] = {
            value: typeof value === 'string' ? value : JSON.stringify(value)
        };
    }

    if (stackConfig.labels && Object.keys(stackConfig.labels).length > 0) {
        const existing = stackConfig.config.labels;
        const merged = typeof existing === 'object' && existing !== null
            ? { ...stackConfig.labels, ...existing }
            : stackConfig.labels;
        configValues[`${namespace}:labels`] = { value: JSON.stringify(merged) };
    }

    const projectId = stackConfig.config.projectId;
    if (typeof projectId === 'string') {
        configValues['gcp:project'] = { value: projectId };
    }

    return configValues;
}

/**
 * Count pending changes in a preview summary; only `same` means nothing to do.
 */
export function countPendingChanges(changeSummary: automation.OpMap): number {
    return Object.entries(changeSummary)
        .filter(([operation]) => operation !== 'same')
        .reduce((total, [, count]) => total + (count ?? 0), 0);
}

function flattenOutputs(outputs: automation.OutputMap): Record<string, unknown> {
    return Object.fromEntries(Object.entries(outputs).map(([key, output]) => [key, output.value]));
}

/**
 * Stack deployment through the Pulumi Automation API
 */
export class DeploymentOrchestrator {
    private readonly errorHandlingOptions: RecoveryOptions;
    private readonly resolveStack: StackResolver;

    constructor(errorHandlingOptions?: Partial<RecoveryOptions>, resolveStack: StackResolver = selectLocalStack) {
        this.errorHandlingOptions = {
            strategy: RecoveryStrategy.RETRY,
            maxRetries: 3,
            retryDelay: 5000, // stack operations
            backoffMultiplier: 2,
            ...errorHandlingOptions
        };
        this.resolveStack = resolveStack;
    }

    /**
     * Preview or update every stack of a deployment
     */
    public async deployAll(config: DeploymentConfig, options?: DeploymentOptions): Promise<DeploymentSummary> {
        const effective: DeploymentOptions = { ...config.deploymentOptions, ...options };
        const logger = new DeploymentLogger(config.name);
        const monitor = PerformanceMonitor.start();

        logger.runStarted(effective.dryRun ? 'preview' : 'deployment', config.stacks.length);

        const run = (stack: StackConfig) => this.deployStackWithErrorHandling(stack, effective, logger);
        const results = await this.runStacks(config.stacks, run, effective);

        return this.summarize(config.name, config.stacks.length, results, monitor, logger);
    }

    /**
     * Destroy every stack of a deployment, last stack first
     */
    public async destroyAll(config: DeploymentConfig, options?: { continueOnFailure?: boolean }): Promise<DeploymentSummary> {
        const logger = new DeploymentLogger(config.name);
        const monitor = PerformanceMonitor.start();

        logger.runStarted('destroy', config.stacks.length);

        const stacks = [...config.stacks].reverse();
        const run = (stack: StackConfig) => this.destroyStack(stack, logger);
        const results = await this.runStacks(stacks, run, { continueOnFailure: options?.continueOnFailure });

        return this.summarize(config.name, config.stacks.length, results, monitor, logger);
    }

    private async runStacks(
        stacks: StackConfig[],
        run: (stack: StackConfig) => Promise<DeploymentResult>,
        options: { parallel?: boolean; continueOnFailure?: boolean }
    ): Promise<DeploymentResult[]> {
        if (options.parallel) {
            return Promise.all(stacks.map(run));
        }

        const results: DeploymentResult[] = [];
        for (const stack of stacks) {
            const result = await run(stack);
            results.push(result);
            if (!result.success && !options.continueOnFailure) {
                break;
            }
        }
        return results;
    }

    private summarize(
        deploymentName: string,
        totalStacks: number,
        results: DeploymentResult[],
        monitor: PerformanceMonitor,
        logger: DeploymentLogger
    ): DeploymentSummary {
        const successfulStacks = results.filter(r => r.success).length;
        const failedStacks = results.length - successfulStacks;
        const totalDuration = monitor.end();

        logger.runFinished(successfulStacks, failedStacks, totalDuration);

        return {
            deploymentName,
            totalStacks,
            successfulStacks,
            failedStacks,
            results,
            totalDuration
        };
    }

    private async deployStackWithErrorHandling(
        stackConfig: StackConfig,
        options: DeploymentOptions,
        logger: DeploymentLogger
    ): Promise<DeploymentResult> {
        const startTime = Date.now();
        let retryCount = 0;

        logger.stackStarted(stackConfig.name, options.dryRun ? 'Previewing' : 'Deploying');

        try {
            const result = await ErrorHandler.executeWithRecovery(
                () => this.deployStack(stackConfig, options),
                `${options.dryRun ? 'preview' : 'deploy'}-${stackConfig.name}`,
                'DeploymentOrchestrator',
                stackConfig.name,
                {
                    ...this.errorHandlingOptions,
                    onRetry: (attempt, maxAttempts, delay) => {
                        retryCount++;
                        logger.retrying(stackConfig.name, attempt, maxAttempts, delay);
                    }
                }
            );

            const duration = Date.now() - startTime;
            logger.stackSucceeded(stackConfig.name, duration, result.outputs);
            return { ...result, duration, retryCount };
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            const duration = Date.now() - startTime;
            logger.stackFailed(stackConfig.name, failure, duration);

            return {
                stackName: stackConfig.name,
                success: false,
                error: failure.message,
                duration,
                retryCount
            };
        }
    }

    private async deployStack(stackConfig: StackConfig, options: DeploymentOptions): Promise<DeploymentResult> {
        const stack = await this.resolveStack({
            stackName: stackConfig.stackName ?? stackConfig.name,
            workDir: stackConfig.workDir
        });

        await stack.setAllConfig(buildStackConfig(stackConfig));

        const policyPacks = options.enforcePolicies === false ? undefined : [POLICY_PACK_DIR];

        if (options.dryRun) {
            const preview = await stack.preview({ policyPacks });
            return {
                stackName: stackConfig.name,
                success: true,
                changeSummary: { ...preview.changeSummary }
            };
        }

        if (options.refresh) {
            await stack.refresh();
        }

        const result = await stack.up({ policyPacks });
        const outputs = flattenOutputs(result.outputs);

        this.verifyOutputs(stackConfig, outputs);

        let changeSummary: automation.OpMap | undefined;
        if (options.verifyIdempotency) {
            changeSummary = await this.verifyIdempotency(stackConfig, stack);
        }

        return {
            stackName: stackConfig.name,
            success: true,
            outputs,
            changeSummary
        };
    }

    /**
     * Every expected output must be present with exactly the expected value
     */
    private verifyOutputs(stackConfig: StackConfig, outputs: Record<string, unknown>): void {
        for (const [key, expected] of Object.entries(stackConfig.expectedOutputs ?? {})) {
            const actual = outputs[key];
            if (actual !== expected) {
                throw new ComponentError(
                    'DeploymentOrchestrator',
                    stackConfig.name,
                    `Output '${key}' is ${actual === undefined ? 'missing' : `'${String(actual)}'`}, expected '${expected}'`,
                    'OUTPUT_MISMATCH',
                    { output: key, expected, actual }
                );
            }
        }
    }

    /**
     * Re-applying unchanged inputs must be a no-op: a fresh preview may only report `same`.
     */
    private async verifyIdempotency(stackConfig: StackConfig, stack: ManagedStack): Promise<automation.OpMap> {
        const preview = await stack.preview();
        const pending = countPendingChanges(preview.changeSummary);

        if (pending > 0) {
            throw new ComponentError(
                'DeploymentOrchestrator',
                stackConfig.name,
                `Stack is not idempotent: ${pending} pending change(s) after update`,
                'DRIFT_DETECTED',
                { changeSummary: preview.changeSummary }
            );
        }

        return { ...preview.changeSummary };
    }

    private async destroyStack(stackConfig: StackConfig, logger: DeploymentLogger): Promise<DeploymentResult> {
        const startTime = Date.now();
        logger.stackStarted(stackConfig.name, 'Destroying');

        try {
            const stack = await this.resolveStack({
                stackName: stackConfig.stackName ?? stackConfig.name,
                workDir: stackConfig.workDir
            });
            await stack.setAllConfig(buildStackConfig(stackConfig));
            await stack.destroy();

            const duration = Date.now() - startTime;
            logger.stackSucceeded(stackConfig.name, duration);
            return { stackName: stackConfig.name, success: true, duration };
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            const duration = Date.now() - startTime;
            logger.stackFailed(stackConfig.name, failure, duration);

            return {
                stackName: stackConfig.name,
                success: false,
                error: failure.message,
                duration
            };
        }
    }
}
