#!/usr/bin/env node

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { InfrastructureAutomation } from '../index';
import { ConfigManager } from './config-manager';
import { DeploymentConfig, DeploymentOptions, DeploymentSummary } from './types';

export interface CliOptions {
    config?: string;
    stacks?: string[];
    parallel?: boolean;
    refresh?: boolean;
    continueOnFailure?: boolean;
    verifyIdempotency?: boolean;
    enforcePolicies?: boolean;
    force?: boolean;
}

const VALUE_FLAGS = ['config', 'stacks'];

/**
 * Parse `<command> [options]`. Unknown flags are rejected.
 */
export function parseCliArgs(args: string[]): { command?: string; options: CliOptions } {
    const [command, ...rest] = args;
    const options: CliOptions = {};

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (!arg.startsWith('--')) {
            throw new Error(`Unexpected argument: ${arg}`);
        }

        const key = arg.slice(2);
        if (VALUE_FLAGS.includes(key)) {
            const value = rest[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new Error(`Option --${key} needs a value`);
            }
            i++; // Skip the value
            if (key === 'config') {
                options.config = value;
            } else {
                options.stacks = value.split(',').map(s => s.trim()).filter(s => s.length > 0);
            }
            continue;
        }

        switch (key) {
            case 'parallel':
                options.parallel = true;
                break;
            case 'refresh':
                options.refresh = true;
                break;
            case 'continue-on-failure':
                options.continueOnFailure = true;
                break;
            case 'verify-idempotency':
                options.verifyIdempotency = true;
                break;
            case 'no-policies':
                options.enforcePolicies = false;
                break;
            case 'force':
                options.force = true;
                break;
            default:
                throw new Error(`Unknown option: ${arg}`);
        }
    }

    return { command, options };
}

/**
 * Keep only the named stacks
 */
export function selectStacks(config: DeploymentConfig, names?: string[]): DeploymentConfig {
    if (!names || names.length === 0) {
        return config;
    }

    const stacks = config.stacks.filter(stack => names.includes(stack.name));
    if (stacks.length === 0) {
        throw new Error(`No matching stacks found. Available stacks: ${config.stacks.map(s => s.name).join(', ')}`);
    }
    return { ...config, stacks };
}

/**
 * Command line interface for the automation API
 */
class AutomationCLI {
    private automation: InfrastructureAutomation;

    constructor(automation: InfrastructureAutomation = new InfrastructureAutomation()) {
        this.automation = automation;
    }

    /**
     * Run a command and resolve to the process exit code
     */
    async run(args: string[]): Promise<number> {
        try {
            const { command, options } = parseCliArgs(args);

            switch (command) {
                case 'deploy':
                    return await this.handleDeploy(options);
                case 'preview':
                    return await this.handlePreview(options);
                case 'destroy':
                    return await this.handleDestroy(options);
                case 'validate':
                    return this.handleValidate(options);
                case undefined:
                case 'help':
                    this.printHelp();
                    return 0;
                default:
                    console.error(`Unknown command: ${command}`);
                    this.printHelp();
                    return 1;
            }
        } catch (error) {
            console.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
            return 1;
        }
    }

    private async handleDeploy(options: CliOptions): Promise<number> {
        const config = this.loadConfig(options);
        console.log(`🚀 Deploying: ${config.stacks.map(s => s.name).join(', ')}`);

        const summary = await this.automation.deployAll(config, {
            ...this.runOptions(options),
            dryRun: false,
            ...(options.verifyIdempotency ? { verifyIdempotency: true } : {})
        });

        this.printDeploymentSummary(summary);
        return summary.failedStacks > 0 ? 1 : 0;
    }

    private async handlePreview(options: CliOptions): Promise<number> {
        const config = this.loadConfig(options);
        console.log(`🔍 Previewing: ${config.stacks.map(s => s.name).join(', ')}`);

        const summary = await this.automation.previewAll(config, this.runOptions(options));

        this.printDeploymentSummary(summary);
        return summary.failedStacks > 0 ? 1 : 0;
    }

    private async handleDestroy(options: CliOptions): Promise<number> {
        const config = this.loadConfig(options);

        if (!options.force) {
            console.log('⚠️  This will destroy all resources in the deployment.');
            console.log('Use --force to confirm.');
            return 1;
        }

        const summary = await this.automation.destroyAll(config, {
            continueOnFailure: options.continueOnFailure
        });

        this.printDeploymentSummary(summary);
        return summary.failedStacks > 0 ? 1 : 0;
    }

    private handleValidate(options: CliOptions): number {
        const config = this.loadConfig(options);

        console.log(`✅ Configuration is valid`);
        console.log(`   Deployment: ${config.name}`);
        console.log(`   Stacks: ${config.stacks.map(s => s.name).join(', ')}`);
        return 0;
    }

    /**
     * Only flags given on the command line override the file's deploymentOptions
     */
    private runOptions(options: CliOptions): DeploymentOptions {
        const runOptions: DeploymentOptions = {};
        const flags = ['parallel', 'refresh', 'continueOnFailure', 'enforcePolicies'] as const;
        for (const flag of flags) {
            const value = options[flag];
            if (value !== undefined) {
                runOptions[flag] = value;
            }
        }
        return runOptions;
    }

    private loadConfig(options: CliOptions): DeploymentConfig {
        const configPath = options.config ?? this.findDefaultConfig();
        if (!configPath) {
            throw new Error('Configuration file not found; pass --config <path>');
        }

        return selectStacks(ConfigManager.loadConfig(configPath), options.stacks);
    }

    private findDefaultConfig(): string | undefined {
        const possiblePaths = [
            'deployment-config.yaml',
            'deployment-config.yml',
            'deployment.yaml',
            'deployment.yml'
        ];

        return possiblePaths.find(configPath => fs.existsSync(configPath));
    }

    private printDeploymentSummary(summary: DeploymentSummary) {
        console.log(`\n📊 Deployment Summary: ${summary.deploymentName}`);
        console.log(`   Total stacks: ${summary.totalStacks}`);
        console.log(`   Successful: ${summary.successfulStacks} ✅`);
        console.log(`   Failed: ${summary.failedStacks} ${summary.failedStacks > 0 ? '❌' : ''}`);
        console.log(`   Duration: ${(summary.totalDuration / 1000).toFixed(2)}s`);

        for (const result of summary.results) {
            if (!result.success) {
                console.log(`   ❌ ${result.stackName}: ${result.error}`);
                continue;
            }
            console.log(`   ✅ ${result.stackName}`);
            for (const [key, value] of Object.entries(result.outputs ?? {})) {
                console.log(`      ${key} = ${String(value)}`);
            }
        }
    }

    private printHelp() {
        console.log(`
Public Datasets Infrastructure CLI

Usage:
  public-datasets-infra <command> [options]

Commands:
  deploy              Deploy all stacks from the configuration file
  preview             Preview changes without applying them
  destroy             Destroy all stacks (requires --force)
  validate            Validate the configuration file
  help                Show this help message

Options:
  --config <path>           Deployment configuration file (default: deployment-config.yaml)
  --stacks <list>           Comma-separated stack names to operate on
  --parallel                Run stacks concurrently
  --refresh                 Refresh stack state before updating
  --continue-on-failure     Keep going after a stack fails
  --verify-idempotency      Fail if a preview after the update still shows changes
  --no-policies             Skip the governance policy pack
  --force                   Confirm destroy

Examples:
  public-datasets-infra validate --config deployment-config.yaml
  public-datasets-infra preview --stacks america-health-rankings
  public-datasets-infra deploy --verify-idempotency
  public-datasets-infra destroy --force
        `);
    }
}

if (require.main === module) {
    // Load environment variables from .env file if it exists
    if (fs.existsSync('.env')) {
        dotenv.config();
    }

    new AutomationCLI().run(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }).catch(error => {
        console.error(error);
        process.exitCode = 1;
    });
}

export { AutomationCLI };
