import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../components/shared/utils/error-handling';
import { DeploymentConfig, DeploymentOptions, StackConfig } from './types';

/**
 * Settings every stack's program needs before it can declare anything
 */
export const REQUIRED_STACK_SETTINGS = ['projectId', 'bucketNamePrefix'] as const;

const COMPONENT = 'ConfigManager';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration management for deployment files
 */
export class ConfigManager {
    /**
     * Load deployment configuration from a YAML file.
     * Relative stack workDirs are resolved against the file's directory.
     */
    public static loadConfig(configPath: string): DeploymentConfig {
        let content: string;
        try {
            content = fs.readFileSync(configPath, 'utf8');
        } catch (error) {
            throw new ConfigurationError(COMPONENT, configPath, 'file', `cannot read configuration: ${error instanceof Error ? error.message : String(error)}`);
        }

        return this.parseConfig(content, path.dirname(path.resolve(configPath)), configPath);
    }

    /**
     * Parse YAML content into a validated, normalized deployment configuration
     */
    public static parseConfig(content: string, baseDir: string = process.cwd(), source: string = '<inline>'): DeploymentConfig {
        const substituted = this.substituteEnvironmentVariables(content, source);

        let raw: unknown;
        try {
            raw = yaml.load(substituted);
        } catch (error) {
            throw new ConfigurationError(COMPONENT, source, 'yaml', error instanceof Error ? error.message : String(error));
        }

        const config = this.toDeploymentConfig(raw, source);
        this.validateConfig(config, source);
        return this.normalizeConfig(config, baseDir);
    }

    /**
     * Create a deployment configuration programmatically
     */
    public static createConfig(
        name: string,
        stacks: StackConfig[],
        options?: {
            description?: string;
            defaultLabels?: Record<string, string>;
            deploymentOptions?: DeploymentOptions;
            baseDir?: string;
        }
    ): DeploymentConfig {
        const config: DeploymentConfig = {
            name,
            description: options?.description,
            defaultLabels: options?.defaultLabels,
            deploymentOptions: options?.deploymentOptions,
            stacks
        };

        this.validateConfig(config, name);
        return this.normalizeConfig(config, options?.baseDir ?? process.cwd());
    }

    /**
     * Substitute environment variables in configuration content.
     * Supports ${VAR_NAME}, ${VAR_NAME:-default} and $VAR_NAME.
     */
    public static substituteEnvironmentVariables(content: string, source: string = '<inline>'): string {
        const pattern = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}|\$([A-Z_][A-Z0-9_]*)\b/g;

        return content.replace(pattern, (_match: string, bracedName?: string, fallback?: string, bareName?: string) => {
            const varName = bracedName ?? bareName ?? '';
            const value = process.env[varName];
            if (value !== undefined) {
                return value;
            }
            if (fallback !== undefined) {
                return fallback;
            }
            throw new ConfigurationError(COMPONENT, source, `env.${varName}`, `environment variable ${varName} is not defined`);
        });
    }

    private static toDeploymentConfig(raw: unknown, source: string): DeploymentConfig {
        if (!isRecord(raw)) {
            throw new ConfigurationError(COMPONENT, source, 'root', 'expected a mapping');
        }

        return {
            name: typeof raw.name === 'string' ? raw.name : '',
            description: this.optionalString(raw.description, 'description', source),
            defaultLabels: this.optionalStringMap(raw.defaultLabels, 'defaultLabels', source),
            stacks: this.toStacks(raw.stacks, source),
            deploymentOptions: this.toDeploymentOptions(raw.deploymentOptions, source)
        };
    }

    /**
     * Stacks may be written as a list or as a map keyed by stack name
     */
    private static toStacks(raw: unknown, source: string): StackConfig[] {
        if (raw === undefined || raw === null) {
            return [];
        }

        let entries: [string | undefined, unknown][];
        if (Array.isArray(raw)) {
            entries = raw.map((stack: unknown): [string | undefined, unknown] => [undefined, stack]);
        } else if (isRecord(raw)) {
            entries = Object.entries(raw);
        } else {
            throw new ConfigurationError(COMPONENT, source, 'stacks', 'expected a list or a mapping');
        }

        return entries.map(([key, stack], index) => {
            const where = `stacks.${key ?? index}`;
            if (!isRecord(stack)) {
                throw new ConfigurationError(COMPONENT, source, where, 'expected a mapping');
            }

            const name = typeof stack.name === 'string' ? stack.name : key ?? '';
            const settings = stack.config ?? {};
            if (!isRecord(settings)) {
                throw new ConfigurationError(COMPONENT, source, `${where}.config`, 'expected a mapping');
            }

            return {
                name,
                workDir: typeof stack.workDir === 'string' ? stack.workDir : '',
                stackName: this.optionalString(stack.stackName, `${where}.stackName`, source),
                configNamespace: this.optionalString(stack.configNamespace, `${where}.configNamespace`, source),
                description: this.optionalString(stack.description, `${where}.description`, source),
                config: settings,
                labels: this.optionalStringMap(stack.labels, `${where}.labels`, source),
                expectedOutputs: this.optionalStringMap(stack.expectedOutputs, `${where}.expectedOutputs`, source)
            };
        });
    }

    private static toDeploymentOptions(raw: unknown, source: string): DeploymentOptions | undefined {
        if (raw === undefined || raw === null) {
            return undefined;
        }
        if (!isRecord(raw)) {
            throw new ConfigurationError(COMPONENT, source, 'deploymentOptions', 'expected a mapping');
        }

        const options: DeploymentOptions = {};
        const flags = ['parallel', 'dryRun', 'refresh', 'continueOnFailure', 'verifyIdempotency', 'enforcePolicies'] as const;
        for (const flag of flags) {
            const value = raw[flag];
            if (value === undefined) {
                continue;
            }
            if (typeof value !== 'boolean') {
                throw new ConfigurationError(COMPONENT, source, `deploymentOptions.${flag}`, 'expected true or false');
            }
            options[flag] = value;
        }
        return options;
    }

    private static optionalString(value: unknown, where: string, source: string): string | undefined {
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value === 'string' || typeof value === 'number') {
            return String(value);
        }
        throw new ConfigurationError(COMPONENT, source, where, 'expected a string');
    }

    /**
     * Scalars are accepted and stringified, since YAML reads `v1` and `1` differently
     */
    private static optionalStringMap(value: unknown, where: string, source: string): Record<string, string> | undefined {
        if (value === undefined || value === null) {
            return undefined;
        }
        if (!isRecord(value)) {
            throw new ConfigurationError(COMPONENT, source, where, 'expected a mapping');
        }

        const result: Record<string, string> = {};
        for (const [key, entry] of Object.entries(value)) {
            if (typeof entry !== 'string' && typeof entry !== 'number' && typeof entry !== 'boolean') {
                throw new ConfigurationError(COMPONENT, source, `${where}.${key}`, 'expected a scalar value');
            }
            result[key] = String(entry);
        }
        return result;
    }

    private static validateConfig(config: DeploymentConfig, source: string): void {
        if (!config.name) {
            throw new ConfigurationError(COMPONENT, source, 'name', 'deployment configuration must have a name');
        }

        if (config.stacks.length === 0) {
            throw new ConfigurationError(COMPONENT, source, 'stacks', 'at least one stack is required');
        }

        const stackNames = new Set<string>();
        for (const stack of config.stacks) {
            if (!stack.name) {
                throw new ConfigurationError(COMPONENT, source, 'stacks', 'every stack must have a name');
            }

            if (stackNames.has(stack.name)) {
                throw new ConfigurationError(COMPONENT, source, `stacks.${stack.name}`, 'duplicate stack name');
            }
            stackNames.add(stack.name);

            if (!stack.workDir) {
                throw new ConfigurationError(COMPONENT, source, `stacks.${stack.name}.workDir`, 'workDir is required');
            }

            for (const key of REQUIRED_STACK_SETTINGS) {
                const value = stack.config[key];
                if (typeof value !== 'string' || value.length === 0) {
                    throw new ConfigurationError(COMPONENT, source, `stacks.${stack.name}.config.${key}`, 'required setting is missing');
                }
            }
        }
    }

    private static normalizeConfig(config: DeploymentConfig, baseDir: string): DeploymentConfig {
        return {
            ...config,
            stacks: config.stacks.map(stack => ({
                ...stack,
                workDir: path.resolve(baseDir, stack.workDir),
                labels: config.defaultLabels || stack.labels
                    ? { ...config.defaultLabels, ...stack.labels }
                    : undefined
            }))
        };
    }
}
