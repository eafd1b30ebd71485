import * as path from 'path';
import {
    ConfigManager,
    DeploymentConfig,
    DeploymentOptions,
    DeploymentOrchestrator,
    DeploymentSummary,
    StackConfig,
    StackResolver
} from './automation';
import { RecoveryOptions } from './components/shared/utils/error-handling';

/**
 * Automation API entry point for the public dataset stacks
 */
export class InfrastructureAutomation {
    private orchestrator: DeploymentOrchestrator;

    constructor(options?: {
        errorHandling?: Partial<RecoveryOptions>;
        resolveStack?: StackResolver;
    }) {
        this.orchestrator = new DeploymentOrchestrator(options?.errorHandling, options?.resolveStack);
    }

    /**
     * Deploy all stacks described by a YAML configuration file
     */
    async deployFromConfig(configPath: string, options?: DeploymentOptions): Promise<DeploymentSummary> {
        const config = ConfigManager.loadConfig(configPath);
        return this.orchestrator.deployAll(config, options);
    }

    async deployAll(config: DeploymentConfig, options?: DeploymentOptions): Promise<DeploymentSummary> {
        return this.orchestrator.deployAll(config, options);
    }

    /**
     * Preview all stacks; nothing is changed
     */
    async previewAll(config: DeploymentConfig, options?: Omit<DeploymentOptions, 'dryRun' | 'verifyIdempotency'>): Promise<DeploymentSummary> {
        return this.orchestrator.deployAll(config, {
            ...options,
            dryRun: true
        });
    }

    async destroyAll(config: DeploymentConfig, options?: { continueOnFailure?: boolean }): Promise<DeploymentSummary> {
        return this.orchestrator.destroyAll(config, options);
    }

    createConfig(name: string, stacks: StackConfig[], options?: {
        description?: string;
        defaultLabels?: Record<string, string>;
        deploymentOptions?: DeploymentOptions;
        baseDir?: string;
    }): DeploymentConfig {
        return ConfigManager.createConfig(name, stacks, options);
    }
}

async function main() {
    const automation = new InfrastructureAutomation();
    const summary = await automation.deployFromConfig(path.resolve('deployment-config.yaml'), {
        verifyIdempotency: true
    });

    if (summary.failedStacks > 0) {
        process.exitCode = 1;
    }
}

export * from './automation';
export * from './components';

if (require.main === module) {
    main().catch(error => {
        console.error(error);
        process.exitCode = 1;
    });
}
