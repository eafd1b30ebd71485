import * as path from 'path';
import { InfrastructureAutomation } from '../../index';
import { POLICY_PACK_DIR } from '../../automation/deployment-orchestrator';

const FIXTURE = path.join(__dirname, '..', 'fixtures', 'deployment-config.yaml');

function createMockStack() {
    return {
        setAllConfig: jest.fn().mockResolvedValue(undefined),
        refresh: jest.fn().mockResolvedValue({}),
        up: jest.fn().mockResolvedValue({
            outputs: {
                'bigquery_dataset-america_health_rankings-dataset_id': { value: 'america_health_rankings', secret: false },
                'storage_bucket-america-health-rankings-name': { value: 'test-prefix-america-health-rankings', secret: false }
            }
        }),
        preview: jest.fn().mockResolvedValue({ changeSummary: { same: 3 } }),
        destroy: jest.fn().mockResolvedValue({})
    };
}

describe('InfrastructureAutomation', () => {
    const savedEnv = { ...process.env };
    let stack: ReturnType<typeof createMockStack>;
    let automation: InfrastructureAutomation;

    beforeEach(() => {
        process.env.TEST_PROJECT_ID = 'test-project-123';
        stack = createMockStack();
        automation = new InfrastructureAutomation({
            errorHandling: { maxRetries: 0, retryDelay: 0 },
            resolveStack: jest.fn().mockResolvedValue(stack)
        });
    });

    afterEach(() => {
        process.env = { ...savedEnv };
    });

    test('should deploy from a configuration file and verify idempotency', async () => {
        const summary = await automation.deployFromConfig(FIXTURE);

        expect(summary.successfulStacks).toBe(1);
        expect(stack.up).toHaveBeenCalledTimes(1);
        expect(stack.preview).toHaveBeenCalledTimes(1);
        expect(summary.results[0].changeSummary).toEqual({ same: 3 });
    });

    test('should preview without updating', async () => {
        const config = automation.createConfig('preview-only', [{
            name: 'america-health-rankings',
            workDir: 'america-health-rankings',
            config: { projectId: 'test-project-123', bucketNamePrefix: 'test-prefix' }
        }]);

        const summary = await automation.previewAll(config);

        expect(summary.successfulStacks).toBe(1);
        expect(stack.preview).toHaveBeenCalledWith({ policyPacks: [POLICY_PACK_DIR] });
        expect(stack.up).not.toHaveBeenCalled();
    });

    test('should destroy every stack', async () => {
        const config = automation.createConfig('teardown', [{
            name: 'america-health-rankings',
            workDir: 'america-health-rankings',
            config: { projectId: 'test-project-123', bucketNamePrefix: 'test-prefix' }
        }]);

        const summary = await automation.destroyAll(config);

        expect(summary.successfulStacks).toBe(1);
        expect(stack.destroy).toHaveBeenCalledTimes(1);
    });
});
