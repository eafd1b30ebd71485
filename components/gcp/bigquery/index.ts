import * as pulumi from "@pulumi/pulumi";
import * as gcp from "@pulumi/gcp";
import { BaseGCPComponent, BaseComponentArgs, CommonValidationRules } from "../../shared/base";
import { DatasetOutputs, IamBinding } from "../../shared/interfaces";
import { ValidationUtils } from "../../shared/utils/error-handling";

/**
 * Arguments for BigQuery Dataset Component
 */
export interface BigQueryDatasetComponentArgs extends BaseComponentArgs {
    datasetId: string;
    description?: string;
    /** Dataset location; BigQuery defaults to US when omitted */
    location?: string;
    iamBindings?: IamBinding[];
}

/**
 * Outputs from BigQuery Dataset Component
 */
export interface BigQueryDatasetComponentOutputs extends DatasetOutputs {
    selfLink: pulumi.Output<string>;
}

/**
 * BigQuery dataset with an optional authoritative IAM policy
 */
export class BigQueryDatasetComponent extends BaseGCPComponent implements BigQueryDatasetComponentOutputs {
    public readonly datasetId: pulumi.Output<string>;
    public readonly selfLink: pulumi.Output<string>;
    public readonly dataset: gcp.bigquery.Dataset;
    public readonly iamPolicy?: gcp.bigquery.DatasetIamPolicy;

    constructor(
        name: string,
        args: BigQueryDatasetComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super("custom:gcp:BigQueryDataset", name, args, opts);

        this.validateArgs(args, [
            CommonValidationRules.required<BigQueryDatasetComponentArgs>("datasetId"),
            CommonValidationRules.ifPresent<BigQueryDatasetComponentArgs>("datasetId", (value, type, component) =>
                ValidationUtils.validateDatasetId(value, type, component)),
            CommonValidationRules.iamBindings<BigQueryDatasetComponentArgs>("iamBindings")
        ]);

        this.dataset = new gcp.bigquery.Dataset(
            name,
            {
                datasetId: args.datasetId,
                project: this.project,
                description: args.description,
                location: args.location,
                labels: this.labels
            },
            this.resourceOptions()
        );
        this.logger.resourceDeclared("gcp.bigquery.Dataset", args.datasetId);

        if (args.iamBindings && args.iamBindings.length > 0) {
            this.iamPolicy = this.attachIamPolicy(name, args.iamBindings);
        }

        this.datasetId = this.dataset.datasetId;
        this.selfLink = this.dataset.selfLink;

        this.registerOutputs({
            datasetId: this.datasetId,
            selfLink: this.selfLink
        });
    }

    /**
     * Replace the dataset's IAM policy with exactly the given bindings
     */
    private attachIamPolicy(name: string, bindings: IamBinding[]): gcp.bigquery.DatasetIamPolicy {
        const policy = gcp.organizations.getIAMPolicyOutput({
            bindings: bindings.map(binding => ({
                role: binding.role,
                members: binding.members
            }))
        }, this.invokeOptions());

        const iamPolicy = new gcp.bigquery.DatasetIamPolicy(
            `${name}-iam`,
            {
                project: this.project,
                datasetId: this.dataset.datasetId,
                policyData: policy.policyData
            },
            this.resourceOptions()
        );
        this.logger.resourceDeclared("gcp.bigquery.DatasetIamPolicy", `${name}-iam`, { bindingCount: bindings.length });

        return iamPolicy;
    }
}
