import * as pulumi from "@pulumi/pulumi";
import * as gcp from "@pulumi/gcp";
import { ValidationUtils } from "./error-handling";

/**
 * Settings for an explicit Google Cloud provider
 */
export interface GcpProviderSettings {
    project: string;
    region?: string;
    impersonateServiceAccount?: string;
}

/**
 * An explicit provider is only needed when the ambient one would not do:
 * a pinned region or an impersonated service account.
 */
export function needsExplicitProvider(settings: Partial<GcpProviderSettings>): boolean {
    return Boolean(settings.region || settings.impersonateServiceAccount);
}

/**
 * Create a Google Cloud provider scoped to a project, optionally pinned to a
 * region and acting as an impersonated service account.
 */
export function createGcpProvider(
    name: string,
    settings: GcpProviderSettings,
    opts?: pulumi.CustomResourceOptions
): gcp.Provider {
    const componentType = "GcpProvider";

    ValidationUtils.validateProjectId(settings.project, componentType, name);
    if (settings.region) {
        ValidationUtils.validateRegion(settings.region, componentType, name);
    }
    if (settings.impersonateServiceAccount) {
        ValidationUtils.validateServiceAccountEmail(settings.impersonateServiceAccount, componentType, name);
    }

    return new gcp.Provider(name, {
        project: settings.project,
        region: settings.region,
        impersonateServiceAccount: settings.impersonateServiceAccount
    }, opts);
}
