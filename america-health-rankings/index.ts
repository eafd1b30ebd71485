import { PublicDatasetComponent, americaHealthRankings } from "../components/datasets";
import { loadStackSettings } from "./settings";

const settings = loadStackSettings();

const publicDataset = new PublicDatasetComponent("america-health-rankings", {
    project: settings.projectId,
    region: settings.region,
    impersonateServiceAccount: settings.impersonatingAcct,
    labels: settings.labels,
    definition: americaHealthRankings,
    bucketNamePrefix: settings.bucketNamePrefix,
    iamPolicies: settings.iamPolicies
});

// Published names are hyphenated, so the outputs are exported as one object:
//   bigquery_dataset-america_health_rankings-dataset_id
//   storage_bucket-america-health-rankings-name
export = publicDataset.stackOutputs();
