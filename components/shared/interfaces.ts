import * as pulumi from "@pulumi/pulumi";

/**
 * Common interfaces used across multiple components
 */

/**
 * One IAM role granted to a set of members, e.g.
 * `{ role: "roles/bigquery.dataViewer", members: ["allAuthenticatedUsers"] }`
 */
export interface IamBinding {
    role: string;
    members: string[];
}

/**
 * IAM bindings per resource, keyed the way stack configuration supplies them:
 * BigQuery datasets by dataset id, buckets by bucket-name suffix.
 */
export interface IamPolicies {
    bigquery_datasets?: { [datasetId: string]: IamBinding[] };
    storage_buckets?: { [bucketSuffix: string]: IamBinding[] };
}

/**
 * Common output interface for components that create warehouse datasets
 */
export interface DatasetOutputs {
    datasetId: pulumi.Output<string>;
}

/**
 * Common output interface for components that create object storage
 */
export interface StorageOutputs {
    bucketName: pulumi.Output<string>;
    bucketUrl?: pulumi.Output<string>;
}
