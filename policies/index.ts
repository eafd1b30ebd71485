import * as policy from "@pulumi/policy";
import { customPolicies } from "./custom-policies";

export const policyPack = new policy.PolicyPack("public-datasets-governance", {
    policies: [
        ...customPolicies,
    ],
});
