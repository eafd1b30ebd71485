import * as pulumi from "@pulumi/pulumi";
import { IamBinding, IamPolicies } from "../components/shared/interfaces";
import { ConfigurationError, ValidationUtils } from "../components/shared/utils/error-handling";

export const CONFIG_NAMESPACE = "america-health-rankings";

/**
 * Stack configuration for the America Health Rankings program
 */
export interface StackSettings {
    projectId: string;
    bucketNamePrefix: string;
    region?: string;
    impersonatingAcct?: string;
    env?: string;
    labels: { [key: string]: string };
    iamPolicies: IamPolicies;
}

/**
 * The reads `loadStackSettings` makes; `pulumi.Config` satisfies it
 */
export interface ConfigSource {
    get(key: string): string | undefined;
    getObject<T>(key: string): T | undefined;
}

const COMPONENT = "StackSettings";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBindings(value: unknown, path: string): IamBinding[] {
    if (!Array.isArray(value)) {
        throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, path, "expected a list of bindings");
    }
    return value.map((entry: unknown, index: number) => {
        const role = isRecord(entry) ? entry.role : undefined;
        const members = isRecord(entry) ? entry.members : undefined;
        if (typeof role !== "string" || !Array.isArray(members) || !members.every(m => typeof m === "string")) {
            throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, `${path}[${index}]`, "expected { role: string, members: string[] }");
        }
        return { role, members: members.map(String) };
    });
}

function parseBindingMap(value: unknown, path: string): { [name: string]: IamBinding[] } | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (!isRecord(value)) {
        throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, path, "expected an object keyed by resource name");
    }
    const result: { [name: string]: IamBinding[] } = {};
    for (const [name, bindings] of Object.entries(value)) {
        result[name] = parseBindings(bindings, `${path}.${name}`);
    }
    return result;
}

/**
 * Parse the `iamPolicies` object:
 * `{ bigquery_datasets: { <datasetId>: [...] }, storage_buckets: { <bucketSuffix>: [...] } }`
 */
export function parseIamPolicies(value: unknown): IamPolicies {
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, "iamPolicies", "expected an object");
    }
    return {
        bigquery_datasets: parseBindingMap(value.bigquery_datasets, "iamPolicies.bigquery_datasets"),
        storage_buckets: parseBindingMap(value.storage_buckets, "iamPolicies.storage_buckets")
    };
}

function parseLabels(value: unknown): { [key: string]: string } {
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, "labels", "expected an object of strings");
    }
    const labels: { [key: string]: string } = {};
    for (const [key, label] of Object.entries(value)) {
        if (typeof label !== "string") {
            throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, `labels.${key}`, "expected a string");
        }
        labels[key] = label;
    }
    return labels;
}

/**
 * Read and validate the stack configuration. `projectId` falls back to `gcp:project`.
 */
export function loadStackSettings(
    config: ConfigSource = new pulumi.Config(CONFIG_NAMESPACE),
    gcpConfig: ConfigSource = new pulumi.Config("gcp")
): StackSettings {
    const projectId = config.get("projectId") ?? gcpConfig.get("project");
    if (!projectId) {
        throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, "projectId", "set projectId or gcp:project");
    }
    ValidationUtils.validateProjectId(projectId, COMPONENT, CONFIG_NAMESPACE);

    const bucketNamePrefix = config.get("bucketNamePrefix");
    if (!bucketNamePrefix) {
        throw new ConfigurationError(COMPONENT, CONFIG_NAMESPACE, "bucketNamePrefix", "a bucket name prefix is required");
    }

    const env = config.get("env");
    const labels = parseLabels(config.getObject<unknown>("labels"));

    return {
        projectId,
        bucketNamePrefix,
        region: config.get("region"),
        impersonatingAcct: config.get("impersonatingAcct"),
        env,
        labels: env ? { env, ...labels } : labels,
        iamPolicies: parseIamPolicies(config.getObject<unknown>("iamPolicies"))
    };
}
