/**
 * Everything needed to host one public dataset: a BigQuery dataset and a
 * Cloud Storage bucket for its source files.
 */
export interface PublicDatasetDefinition {
    datasetId: string;
    description: string;
    /** Appended to the configured prefix to form the bucket name */
    bucketSuffix: string;
    bucketLocation: string;
    forceDestroy: boolean;
    uniformBucketLevelAccess: boolean;
}

export const americaHealthRankings: PublicDatasetDefinition = {
    datasetId: "america_health_rankings",
    description: "America Health Rankings dataset",
    bucketSuffix: "america-health-rankings",
    bucketLocation: "US",
    forceDestroy: true,
    uniformBucketLevelAccess: true
};

export function buildBucketName(prefix: string, suffix: string): string {
    return `${prefix}-${suffix}`;
}

/**
 * Published stack output names, consumed by other stacks through stack references.
 */
export function datasetOutputName(datasetId: string): string {
    return `bigquery_dataset-${datasetId}-dataset_id`;
}

export function bucketOutputName(bucketSuffix: string): string {
    return `storage_bucket-${bucketSuffix}-name`;
}
