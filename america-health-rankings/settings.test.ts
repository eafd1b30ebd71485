import { ConfigSource, loadStackSettings, parseIamPolicies } from "./settings";
import { ConfigurationError, ValidationError } from "../components/shared/utils/error-handling";

/**
 * Stack configuration held in memory; objects are stored as JSON like `pulumi config set --path`
 */
class InMemoryConfig implements ConfigSource {
    constructor(private readonly values: { [key: string]: string } = {}) {}

    get(key: string): string | undefined {
        return this.values[key];
    }

    getObject<T>(key: string): T | undefined {
        const value = this.values[key];
        return value === undefined ? undefined : JSON.parse(value);
    }
}

describe("loadStackSettings", () => {
    test("reads the required settings", () => {
        const settings = loadStackSettings(new InMemoryConfig({
            projectId: "test-project-123",
            bucketNamePrefix: "test-prefix"
        }), new InMemoryConfig());

        expect(settings).toEqual({
            projectId: "test-project-123",
            bucketNamePrefix: "test-prefix",
            region: undefined,
            impersonatingAcct: undefined,
            env: undefined,
            labels: {},
            iamPolicies: {}
        });
    });

    test("reads the optional settings and adds env as a label", () => {
        const settings = loadStackSettings(new InMemoryConfig({
            projectId: "test-project-123",
            bucketNamePrefix: "test-prefix",
            region: "us-central1",
            impersonatingAcct: "deployer@test-project-123.iam.gserviceaccount.com",
            env: "dev",
            labels: JSON.stringify({ team: "data" })
        }), new InMemoryConfig());

        expect(settings.region).toBe("us-central1");
        expect(settings.impersonatingAcct).toBe("deployer@test-project-123.iam.gserviceaccount.com");
        expect(settings.labels).toEqual({ env: "dev", team: "data" });
    });

    test("falls back to gcp:project", () => {
        const settings = loadStackSettings(
            new InMemoryConfig({ bucketNamePrefix: "test-prefix" }),
            new InMemoryConfig({ project: "fallback-project" })
        );

        expect(settings.projectId).toBe("fallback-project");
    });

    test("fails without a project", () => {
        expect(() => loadStackSettings(
            new InMemoryConfig({ bucketNamePrefix: "test-prefix" }),
            new InMemoryConfig()
        )).toThrow("[StackSettings:america-health-rankings] Configuration error at 'projectId': set projectId or gcp:project");
    });

    test("fails without a bucket name prefix", () => {
        expect(() => loadStackSettings(
            new InMemoryConfig({ projectId: "test-project-123" }),
            new InMemoryConfig()
        )).toThrow(ConfigurationError);
    });

    test("rejects an invalid project id", () => {
        expect(() => loadStackSettings(
            new InMemoryConfig({ projectId: "Not_A_Project", bucketNamePrefix: "test-prefix" }),
            new InMemoryConfig()
        )).toThrow(ValidationError);
    });

    test("rejects non-string label values", () => {
        expect(() => loadStackSettings(new InMemoryConfig({
            projectId: "test-project-123",
            bucketNamePrefix: "test-prefix",
            labels: JSON.stringify({ tier: 1 })
        }), new InMemoryConfig())).toThrow("Configuration error at 'labels.tier'");
    });
});

describe("parseIamPolicies", () => {
    test("returns an empty policy set when unset", () => {
        expect(parseIamPolicies(undefined)).toEqual({});
    });

    test("parses bindings per bucket suffix", () => {
        const policies = parseIamPolicies({
            storage_buckets: {
                "america-health-rankings": [{ role: "roles/storage.objectViewer", members: ["allUsers"] }]
            }
        });

        expect(policies.storage_buckets).toEqual({
            "america-health-rankings": [{ role: "roles/storage.objectViewer", members: ["allUsers"] }]
        });
        expect(policies.bigquery_datasets).toBeUndefined();
    });

    test("reports the path of a malformed binding", () => {
        expect(() => parseIamPolicies({
            bigquery_datasets: { america_health_rankings: [{ role: "roles/bigquery.dataViewer" }] }
        })).toThrow("Configuration error at 'iamPolicies.bigquery_datasets.america_health_rankings[0]'");
    });

    test("rejects a list where an object is expected", () => {
        expect(() => parseIamPolicies([])).toThrow("Configuration error at 'iamPolicies'");
    });
});
