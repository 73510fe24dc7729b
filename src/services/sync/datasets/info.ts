import { CPES_SCHEMA } from "../canonical/cpes.js";
import { EPSS_SCHEMA } from "../canonical/epss.js";
import { VULNRICHMENT_SCHEMA } from "../canonical/vulnrichment.js";

import type { DatasetName } from "../../../config.js";
import type { TableSchema } from "../../../types/index.js";

export interface DatasetInfo {
  schema: TableSchema;
  /** Run log file prefix */
  logPrefix: string;
}

export const DATASET_INFO: Record<DatasetName, DatasetInfo> = {
  vulnrichment: { schema: VULNRICHMENT_SCHEMA, logPrefix: "vulnrichment_git_download" },
  cpes: { schema: CPES_SCHEMA, logPrefix: "cpes_download" },
  epss: { schema: EPSS_SCHEMA, logPrefix: "epss_download" },
};
