import * as pulumi from "@pulumi/pulumi";
import * as gcp from "@pulumi/gcp";
import { BaseGCPComponent, BaseComponentArgs, CommonValidationRules } from "../../shared/base";
import { IamBinding, StorageOutputs } from "../../shared/interfaces";
import { ValidationUtils } from "../../shared/utils/error-handling";

/**
 * Arguments for Storage Bucket Component
 */
export interface StorageBucketComponentArgs extends BaseComponentArgs {
    bucketName: string;
    location: string;
    /** Allow deletion even when the bucket still holds objects */
    forceDestroy?: boolean;
    uniformBucketLevelAccess?: boolean;
    iamBindings?: IamBinding[];
}

/**
 * Cloud Storage bucket with an optional authoritative IAM policy
 */
export class StorageBucketComponent extends BaseGCPComponent implements StorageOutputs {
    public readonly bucketName: pulumi.Output<string>;
    public readonly bucketUrl: pulumi.Output<string>;
    public readonly bucket: gcp.storage.Bucket;
    public readonly iamPolicy?: gcp.storage.BucketIAMPolicy;

    constructor(
        name: string,
        args: StorageBucketComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super("custom:gcp:StorageBucket", name, args, opts);

        this.validateArgs(args, [
            CommonValidationRules.required<StorageBucketComponentArgs>("bucketName"),
            CommonValidationRules.required<StorageBucketComponentArgs>("location"),
            CommonValidationRules.ifPresent<StorageBucketComponentArgs>("bucketName", (value, type, component) =>
                ValidationUtils.validateBucketName(value, type, component)),
            CommonValidationRules.ifPresent<StorageBucketComponentArgs>("location", (value, type, component) =>
                ValidationUtils.validateLocation(value, type, component)),
            CommonValidationRules.iamBindings<StorageBucketComponentArgs>("iamBindings")
        ]);

        this.bucket = new gcp.storage.Bucket(
            name,
            {
                name: args.bucketName,
                project: this.project,
                location: args.location,
                forceDestroy: args.forceDestroy ?? false,
                uniformBucketLevelAccess: args.uniformBucketLevelAccess ?? true,
                labels: this.labels
            },
            // Access logging is configured outside this program
            this.resourceOptions({ ignoreChanges: ["logging"] })
        );
        this.logger.resourceDeclared("gcp.storage.Bucket", args.bucketName, {
            location: args.location,
            forceDestroy: args.forceDestroy ?? false
        });

        if (args.iamBindings && args.iamBindings.length > 0) {
            this.iamPolicy = this.attachIamPolicy(name, args.iamBindings);
        }

        this.bucketName = this.bucket.name;
        this.bucketUrl = this.bucket.url;

        this.registerOutputs({
            bucketName: this.bucketName,
            bucketUrl: this.bucketUrl
        });
    }

    /**
     * Replace the bucket's IAM policy with exactly the given bindings
     */
    private attachIamPolicy(name: string, bindings: IamBinding[]): gcp.storage.BucketIAMPolicy {
        const policy = gcp.organizations.getIAMPolicyOutput({
            bindings: bindings.map(binding => ({
                role: binding.role,
                members: binding.members
            }))
        }, this.invokeOptions());

        const iamPolicy = new gcp.storage.BucketIAMPolicy(
            `${name}-iam`,
            {
                bucket: this.bucket.name,
                policyData: policy.policyData
            },
            this.resourceOptions()
        );
        this.logger.resourceDeclared("gcp.storage.BucketIAMPolicy", `${name}-iam`, { bindingCount: bindings.length });

        return iamPolicy;
    }
}
