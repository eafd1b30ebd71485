import * as pulumi from "@pulumi/pulumi";
import { BaseGCPComponent, BaseComponentArgs, CommonValidationRules } from "../shared/base";
import { IamPolicies } from "../shared/interfaces";
import { BigQueryDatasetComponent } from "../gcp/bigquery";
import { StorageBucketComponent } from "../gcp/storage";
import {
    PublicDatasetDefinition,
    buildBucketName,
    bucketOutputName,
    datasetOutputName
} from "./catalog";

export * from "./catalog";

/**
 * Arguments for Public Dataset Component
 */
export interface PublicDatasetComponentArgs extends BaseComponentArgs {
    definition: PublicDatasetDefinition;
    bucketNamePrefix: string;
    iamPolicies?: IamPolicies;
}

/**
 * Warehouse dataset plus storage bucket for one public dataset.
 * The two resources are independent; neither references the other.
 */
export class PublicDatasetComponent extends BaseGCPComponent {
    public readonly datasetId: pulumi.Output<string>;
    public readonly bucketName: pulumi.Output<string>;
    public readonly warehouse: BigQueryDatasetComponent;
    public readonly storage: StorageBucketComponent;
    private readonly definition: PublicDatasetDefinition;

    constructor(
        name: string,
        args: PublicDatasetComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super("custom:gcp:PublicDataset", name, args, opts);

        this.validateArgs(args, [
            CommonValidationRules.required<PublicDatasetComponentArgs>("definition"),
            CommonValidationRules.required<PublicDatasetComponentArgs>("bucketNamePrefix")
        ]);
        this.definition = args.definition;

        const childArgs = {
            project: this.project,
            labels: args.labels,
            provider: this.provider
        };

        this.warehouse = new BigQueryDatasetComponent(`${name}-dataset`, {
            ...childArgs,
            datasetId: args.definition.datasetId,
            description: args.definition.description,
            iamBindings: args.iamPolicies?.bigquery_datasets?.[args.definition.datasetId]
        }, { parent: this });

        this.storage = new StorageBucketComponent(`${name}-bucket`, {
            ...childArgs,
            bucketName: buildBucketName(args.bucketNamePrefix, args.definition.bucketSuffix),
            location: args.definition.bucketLocation,
            forceDestroy: args.definition.forceDestroy,
            uniformBucketLevelAccess: args.definition.uniformBucketLevelAccess,
            iamBindings: args.iamPolicies?.storage_buckets?.[args.definition.bucketSuffix]
        }, { parent: this });

        this.datasetId = this.warehouse.datasetId;
        this.bucketName = this.storage.bucketName;

        this.registerOutputs({
            datasetId: this.datasetId,
            bucketName: this.bucketName
        });
    }

    /**
     * The stack outputs for this dataset, keyed by their published names
     */
    public stackOutputs(): { [outputName: string]: pulumi.Output<string> } {
        return {
            [datasetOutputName(this.definition.datasetId)]: this.datasetId,
            [bucketOutputName(this.definition.bucketSuffix)]: this.bucketName
        };
    }
}
