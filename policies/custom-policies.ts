import * as policy from "@pulumi/policy";

export const BUCKET_TYPE = "gcp:storage/bucket:Bucket";
export const DATASET_TYPE = "gcp:bigquery/dataset:Dataset";

type Report = (message: string) => void;
type Props = Record<string, unknown>;

function labelsOf(props: Props): Record<string, unknown> {
    const labels = props.labels;
    return typeof labels === "object" && labels !== null ? Object.fromEntries(Object.entries(labels)) : {};
}

export function checkUniformBucketAccess(type: string, props: Props, reportViolation: Report): void {
    if (type === BUCKET_TYPE && props.uniformBucketLevelAccess !== true) {
        reportViolation("Cloud Storage buckets must enable uniform bucket-level access; per-object ACLs are not allowed");
    }
}

export function checkDatasetDescription(type: string, props: Props, reportViolation: Report): void {
    if (type !== DATASET_TYPE) {
        return;
    }
    const description = props.description;
    if (typeof description !== "string" || description.trim().length === 0) {
        reportViolation("BigQuery datasets must carry a non-empty description");
    }
}

export function checkBucketForceDestroy(type: string, props: Props, reportViolation: Report): void {
    if (type === BUCKET_TYPE && props.forceDestroy !== true) {
        reportViolation("Public dataset buckets should set forceDestroy so teardown does not fail on remaining objects");
    }
}

export function checkManagedByLabel(type: string, props: Props, reportViolation: Report): void {
    if (type !== BUCKET_TYPE && type !== DATASET_TYPE) {
        return;
    }
    if (labelsOf(props)["managed-by"] !== "pulumi") {
        reportViolation('Resource is missing the label managed-by=pulumi');
    }
}

const requireUniformBucketAccess: policy.ResourceValidationPolicy = {
    name: "require-uniform-bucket-access",
    description: "Cloud Storage buckets must use uniform bucket-level access",
    enforcementLevel: "mandatory",
    validateResource: (args, reportViolation) => checkUniformBucketAccess(args.type, args.props, reportViolation),
};

const requireDatasetDescription: policy.ResourceValidationPolicy = {
    name: "require-dataset-description",
    description: "BigQuery datasets must have a description",
    enforcementLevel: "mandatory",
    validateResource: (args, reportViolation) => checkDatasetDescription(args.type, args.props, reportViolation),
};

const requireBucketForceDestroy: policy.ResourceValidationPolicy = {
    name: "require-bucket-force-destroy",
    description: "Public dataset buckets should be deletable while non-empty",
    enforcementLevel: "advisory",
    validateResource: (args, reportViolation) => checkBucketForceDestroy(args.type, args.props, reportViolation),
};

const requireManagedByLabel: policy.ResourceValidationPolicy = {
    name: "require-managed-by-label",
    description: "Buckets and datasets must be labelled managed-by=pulumi",
    enforcementLevel: "advisory",
    validateResource: (args, reportViolation) => checkManagedByLabel(args.type, args.props, reportViolation),
};

export const customPolicies: policy.ResourceValidationPolicy[] = [
    requireUniformBucketAccess,
    requireDatasetDescription,
    requireBucketForceDestroy,
    requireManagedByLabel,
];
