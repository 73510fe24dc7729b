export { DATASET_INFO, type DatasetInfo } from "./info.js";
export { createCpesPipeline } from "./cpes.js";
export { createEpssPipeline, resolveEpssDate } from "./epss.js";
export { createVulnrichmentPipeline } from "./vulnrichment.js";
