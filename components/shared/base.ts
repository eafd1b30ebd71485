import * as pulumi from "@pulumi/pulumi";
import * as gcp from "@pulumi/gcp";
import { ComponentLogger } from "./utils/logging";
import { ValidationError, ValidationUtils } from "./utils/error-handling";
import { createGcpProvider, needsExplicitProvider } from "./utils/gcp-provider";

/**
 * Base arguments interface that all component arguments should extend
 */
export interface BaseComponentArgs {
    project: string;
    region?: string;
    impersonateServiceAccount?: string;
    labels?: { [key: string]: string };
    /**
     * Provider shared by a parent component; takes precedence over region and impersonation.
     */
    provider?: gcp.Provider;
}

/**
 * Turn an arbitrary string into a valid GCP label value.
 */
export function toLabelValue(value: string): string {
    return value.toLowerCase().replace(/[^a-z0-9_-]/g, '-').slice(0, 63);
}

/**
 * Base GCP component class that provides common functionality
 * All Google Cloud infrastructure components should extend this class
 */
export abstract class BaseGCPComponent extends pulumi.ComponentResource {
    protected readonly project: string;
    protected readonly labels: { [key: string]: string };
    protected readonly logger: ComponentLogger;
    protected readonly provider?: gcp.Provider;
    private readonly componentName: string;

    constructor(
        type: string,
        name: string,
        args: BaseComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super(type, name, {}, opts);
        this.componentName = name;

        this.logger = new ComponentLogger(type, name, {
            project: args.project,
            stackName: pulumi.getStack()
        });

        try {
            ValidationUtils.validateProjectId(args.project, this.getResourceType(), name);
            this.project = args.project;
            this.labels = this.buildLabels(type, args.labels);
            this.provider = args.provider ?? this.createProvider(args);

            this.logger.debug("Component initialization completed", {
                labelCount: Object.keys(this.labels).length,
                explicitProvider: this.provider !== undefined
            });
        } catch (error) {
            this.logger.error("Component initialization failed", error instanceof Error ? error : new Error(String(error)));
            throw error;
        }
    }

    /**
     * Build labels with validation
     */
    private buildLabels(componentType: string, userLabels?: { [key: string]: string }): { [key: string]: string } {
        const labels = {
            component: toLabelValue(componentType),
            "managed-by": "pulumi",
            stack: toLabelValue(pulumi.getStack()),
            project: toLabelValue(pulumi.getProject()),
            ...userLabels
        };

        ValidationUtils.validateLabels(labels, this.getResourceType(), this.getResourceName());
        return labels;
    }

    private createProvider(args: BaseComponentArgs): gcp.Provider | undefined {
        if (!needsExplicitProvider(args)) {
            return undefined;
        }

        this.logger.debug("Creating GCP provider", { region: args.region });
        return createGcpProvider(`${this.componentName}-provider`, {
            project: args.project,
            region: args.region,
            impersonateServiceAccount: args.impersonateServiceAccount
        }, { parent: this });
    }

    /**
     * Options for child resources: parented to this component, on its provider if any
     */
    protected resourceOptions(extra?: pulumi.CustomResourceOptions): pulumi.CustomResourceOptions {
        return {
            parent: this,
            ...(this.provider ? { provider: this.provider } : {}),
            ...extra
        };
    }

    /**
     * Options for data-source invocations made on behalf of this component
     */
    protected invokeOptions(): pulumi.InvokeOptions {
        return {
            parent: this,
            ...(this.provider ? { provider: this.provider } : {})
        };
    }

    /**
     * Validate arguments with structured error handling
     */
    protected validateArgs<T>(args: T, validationRules: ValidationRule<T>[]): void {
        this.logger.validationStarted("component arguments");

        try {
            for (const rule of validationRules) {
                rule.validate(args, this.getResourceType(), this.getResourceName());
            }

            this.logger.validationPassed("component arguments");
        } catch (error) {
            this.logger.validationFailed("component arguments", error instanceof Error ? error : new Error(String(error)));
            throw error;
        }
    }

    /**
     * Get component type for error reporting
     */
    protected getResourceType(): string {
        return this.constructor.name;
    }

    /**
     * Get component name for error reporting
     */
    protected getResourceName(): string {
        return this.componentName;
    }
}

/**
 * Validation rule interface
 */
export interface ValidationRule<T> {
    validate(args: T, componentType: string, componentName: string): void;
}

/**
 * Common validation rules
 */
export class CommonValidationRules {
    static required<T>(fieldName: keyof T): ValidationRule<T> {
        return {
            validate: (args: T, componentType: string, componentName: string) => {
                ValidationUtils.validateRequired(args[fieldName], String(fieldName), componentType, componentName);
            }
        };
    }

    /**
     * Apply a string check when the field is present
     */
    static ifPresent<T>(
        fieldName: keyof T,
        check: (value: string, componentType: string, componentName: string) => void
    ): ValidationRule<T> {
        return {
            validate: (args: T, componentType: string, componentName: string) => {
                const value = args[fieldName];
                if (typeof value === 'string') {
                    check(value, componentType, componentName);
                }
            }
        };
    }

    /**
     * Every IAM binding needs a role and at least one member
     */
    static iamBindings<T>(fieldName: keyof T): ValidationRule<T> {
        return {
            validate: (args: T, componentType: string, componentName: string) => {
                const bindings = args[fieldName];
                if (!Array.isArray(bindings)) {
                    return;
                }
                bindings.forEach((binding: unknown, index: number) => {
                    const role = isRecord(binding) ? binding.role : undefined;
                    const members = isRecord(binding) ? binding.members : undefined;
                    if (typeof role !== 'string' || !role.startsWith('roles/')) {
                        throw new ValidationError(componentType, componentName, `${String(fieldName)}[${index}].role`, role, 'role name starting with "roles/"');
                    }
                    if (!Array.isArray(members) || members.length === 0) {
                        throw new ValidationError(componentType, componentName, `${String(fieldName)}[${index}].members`, members, 'non-empty array');
                    }
                });
            }
        };
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
