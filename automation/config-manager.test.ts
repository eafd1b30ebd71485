import * as path from 'path';
import { ConfigManager } from './config-manager';
import { StackConfig } from './types';
import { ConfigurationError } from '../components/shared/utils/error-handling';

const FIXTURE_DIR = path.join(__dirname, '..', 'tests', 'fixtures');
const FIXTURE = path.join(FIXTURE_DIR, 'deployment-config.yaml');

describe('ConfigManager', () => {
    const savedEnv = { ...process.env };

    beforeEach(() => {
        process.env.TEST_PROJECT_ID = 'test-project-123';
        delete process.env.TEST_STACK_NAME;
    });

    afterEach(() => {
        process.env = { ...savedEnv };
    });

    describe('loadConfig', () => {
        it('should load and normalize the deployment file', () => {
            const config = ConfigManager.loadConfig(FIXTURE);

            expect(config.name).toBe('test-deployment');
            expect(config.deploymentOptions).toEqual({ verifyIdempotency: true });
            expect(config.stacks).toHaveLength(1);

            const [stack] = config.stacks;
            expect(stack.name).toBe('america-health-rankings');
            expect(stack.stackName).toBe('dev');
            expect(stack.workDir).toBe(path.join(FIXTURE_DIR, 'programs', 'america-health-rankings'));
            expect(stack.config).toEqual({
                projectId: 'test-project-123',
                bucketNamePrefix: 'test-prefix',
                env: 'dev'
            });
            expect(stack.labels).toEqual({ owner: 'data-team', tier: 'public' });
            expect(stack.expectedOutputs).toEqual({
                'bigquery_dataset-america_health_rankings-dataset_id': 'america_health_rankings',
                'storage_bucket-america-health-rankings-name': 'test-prefix-america-health-rankings'
            });
        });

        it('should take the stack name from the environment when set', () => {
            process.env.TEST_STACK_NAME = 'prod';

            const config = ConfigManager.loadConfig(FIXTURE);

            expect(config.stacks[0].stackName).toBe('prod');
        });

        it('should fail when a referenced variable is not set', () => {
            delete process.env.TEST_PROJECT_ID;

            expect(() => ConfigManager.loadConfig(FIXTURE)).toThrow(
                "Configuration error at 'env.TEST_PROJECT_ID': environment variable TEST_PROJECT_ID is not defined"
            );
        });

        it('should fail for a missing file', () => {
            expect(() => ConfigManager.loadConfig(path.join(FIXTURE_DIR, 'missing.yaml'))).toThrow(ConfigurationError);
        });
    });

    describe('substituteEnvironmentVariables', () => {
        it('should substitute braced, bare and defaulted variables', () => {
            process.env.DATASET_ENV = 'staging';

            const result = ConfigManager.substituteEnvironmentVariables('a: ${DATASET_ENV}\nb: $DATASET_ENV\nc: ${UNSET_DATASET_VAR:-fallback}');

            expect(result).toBe('a: staging\nb: staging\nc: fallback');
        });

        it('should prefer the environment over the default', () => {
            process.env.DATASET_ENV = 'staging';

            expect(ConfigManager.substituteEnvironmentVariables('${DATASET_ENV:-dev}')).toBe('staging');
        });

        it('should reject undefined variables', () => {
            expect(() => ConfigManager.substituteEnvironmentVariables('${UNSET_DATASET_VAR}')).toThrow(
                "[ConfigManager:<inline>] Configuration error at 'env.UNSET_DATASET_VAR': environment variable UNSET_DATASET_VAR is not defined"
            );
        });
    });

    describe('parseConfig', () => {
        const validStack = [
            '  - name: datasets',
            '    workDir: ./datasets',
            '    config:',
            '      projectId: test-project-123',
            '      bucketNamePrefix: test-prefix'
        ].join('\n');

        it('should accept stacks written as a list', () => {
            const config = ConfigManager.parseConfig(`name: listed\nstacks:\n${validStack}\n`, '/srv/infra');

            expect(config.stacks).toHaveLength(1);
            expect(config.stacks[0].name).toBe('datasets');
            expect(config.stacks[0].workDir).toBe(path.resolve('/srv/infra', './datasets'));
            expect(config.stacks[0].labels).toBeUndefined();
        });

        it('should require a deployment name', () => {
            expect(() => ConfigManager.parseConfig(`stacks:\n${validStack}\n`)).toThrow(
                "Configuration error at 'name': deployment configuration must have a name"
            );
        });

        it('should require at least one stack', () => {
            expect(() => ConfigManager.parseConfig('name: empty\nstacks: []\n')).toThrow(
                "Configuration error at 'stacks': at least one stack is required"
            );
        });

        it('should reject duplicate stack names', () => {
            expect(() => ConfigManager.parseConfig(`name: twice\nstacks:\n${validStack}\n${validStack}\n`)).toThrow(
                "Configuration error at 'stacks.datasets': duplicate stack name"
            );
        });

        it('should require the bucket name prefix', () => {
            const content = [
                'name: incomplete',
                'stacks:',
                '  datasets:',
                '    workDir: ./datasets',
                '    config:',
                '      projectId: test-project-123'
            ].join('\n');

            expect(() => ConfigManager.parseConfig(content)).toThrow(
                "Configuration error at 'stacks.datasets.config.bucketNamePrefix': required setting is missing"
            );
        });

        it('should require a workDir', () => {
            const content = [
                'name: nowhere',
                'stacks:',
                '  datasets:',
                '    config:',
                '      projectId: test-project-123',
                '      bucketNamePrefix: test-prefix'
            ].join('\n');

            expect(() => ConfigManager.parseConfig(content)).toThrow(
                "Configuration error at 'stacks.datasets.workDir': workDir is required"
            );
        });

        it('should reject non-boolean deployment options', () => {
            const content = `name: flags\nstacks:\n${validStack}\ndeploymentOptions:\n  parallel: "yes"\n`;

            expect(() => ConfigManager.parseConfig(content)).toThrow(
                "Configuration error at 'deploymentOptions.parallel': expected true or false"
            );
        });

        it('should report malformed YAML', () => {
            expect(() => ConfigManager.parseConfig('name: [unclosed')).toThrow("Configuration error at 'yaml'");
        });
    });

    describe('createConfig', () => {
        it('should validate and normalize a programmatic configuration', () => {
            const stacks: StackConfig[] = [
                {
                    name: 'america-health-rankings',
                    workDir: 'america-health-rankings',
                    config: { projectId: 'test-project-123', bucketNamePrefix: 'test-prefix' },
                    labels: { tier: 'public' }
                }
            ];

            const config = ConfigManager.createConfig('programmatic', stacks, {
                defaultLabels: { owner: 'data-team' },
                baseDir: '/srv/infra'
            });

            expect(config.name).toBe('programmatic');
            expect(config.stacks[0].workDir).toBe(path.resolve('/srv/infra', 'america-health-rankings'));
            expect(config.stacks[0].labels).toEqual({ owner: 'data-team', tier: 'public' });
        });

        it('should reject stacks without required settings', () => {
            const stacks: StackConfig[] = [{ name: 'bare', workDir: '.', config: {} }];

            expect(() => ConfigManager.createConfig('programmatic', stacks)).toThrow(ConfigurationError);
        });
    });
});
