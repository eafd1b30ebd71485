import {
    BUCKET_TYPE,
    DATASET_TYPE,
    checkBucketForceDestroy,
    checkDatasetDescription,
    checkManagedByLabel,
    checkUniformBucketAccess,
    customPolicies
} from "../../policies/custom-policies";

// Collects violations reported by a policy check
class MockViolationReporter {
    private violations: string[] = [];

    reportViolation = (message: string): void => {
        this.violations.push(message);
    };

    getViolations(): string[] {
        return [...this.violations];
    }
}

describe("Custom Policy Validation", () => {
    let reporter: MockViolationReporter;

    beforeEach(() => {
        reporter = new MockViolationReporter();
    });

    describe("Policy Pack Structure", () => {
        test("should export all expected custom policies", () => {
            expect(customPolicies.map(p => p.name)).toEqual([
                "require-uniform-bucket-access",
                "require-dataset-description",
                "require-bucket-force-destroy",
                "require-managed-by-label"
            ]);
        });

        test("should make the access and description rules mandatory", () => {
            const mandatory = customPolicies.filter(p => p.enforcementLevel === "mandatory").map(p => p.name);
            const advisory = customPolicies.filter(p => p.enforcementLevel === "advisory").map(p => p.name);

            expect(mandatory).toEqual(["require-uniform-bucket-access", "require-dataset-description"]);
            expect(advisory).toEqual(["require-bucket-force-destroy", "require-managed-by-label"]);
        });
    });

    describe("require-uniform-bucket-access", () => {
        test("should pass buckets with uniform access", () => {
            checkUniformBucketAccess(BUCKET_TYPE, { uniformBucketLevelAccess: true }, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([]);
        });

        test("should flag buckets using per-object ACLs", () => {
            checkUniformBucketAccess(BUCKET_TYPE, { uniformBucketLevelAccess: false }, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([
                "Cloud Storage buckets must enable uniform bucket-level access; per-object ACLs are not allowed"
            ]);
        });

        test("should ignore other resource types", () => {
            checkUniformBucketAccess(DATASET_TYPE, {}, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([]);
        });
    });

    describe("require-dataset-description", () => {
        test("should pass datasets with a description", () => {
            checkDatasetDescription(DATASET_TYPE, { description: "America Health Rankings dataset" }, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([]);
        });

        test("should flag blank or missing descriptions", () => {
            checkDatasetDescription(DATASET_TYPE, { description: "   " }, reporter.reportViolation);
            checkDatasetDescription(DATASET_TYPE, {}, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([
                "BigQuery datasets must carry a non-empty description",
                "BigQuery datasets must carry a non-empty description"
            ]);
        });
    });

    describe("require-bucket-force-destroy", () => {
        test("should pass buckets that can be force destroyed", () => {
            checkBucketForceDestroy(BUCKET_TYPE, { forceDestroy: true }, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([]);
        });

        test("should flag buckets that keep their objects", () => {
            checkBucketForceDestroy(BUCKET_TYPE, { forceDestroy: false }, reporter.reportViolation);

            expect(reporter.getViolations()).toHaveLength(1);
        });
    });

    describe("require-managed-by-label", () => {
        test("should pass labelled buckets and datasets", () => {
            checkManagedByLabel(BUCKET_TYPE, { labels: { "managed-by": "pulumi" } }, reporter.reportViolation);
            checkManagedByLabel(DATASET_TYPE, { labels: { "managed-by": "pulumi", env: "dev" } }, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([]);
        });

        test("should flag resources without the label", () => {
            checkManagedByLabel(DATASET_TYPE, { labels: { env: "dev" } }, reporter.reportViolation);
            checkManagedByLabel(BUCKET_TYPE, {}, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([
                "Resource is missing the label managed-by=pulumi",
                "Resource is missing the label managed-by=pulumi"
            ]);
        });

        test("should ignore other resource types", () => {
            checkManagedByLabel("gcp:storage/bucketIAMPolicy:BucketIAMPolicy", {}, reporter.reportViolation);

            expect(reporter.getViolations()).toEqual([]);
        });
    });
});
