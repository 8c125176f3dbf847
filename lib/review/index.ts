export {
  listTenantAnomalies,
  reviewAnomaly,
  listAlertCandidates,
  isAnomalyStatus,
  ANOMALY_STATUSES,
} from "./anomalies";
export type { ListAnomaliesOptions, ReviewInput, StatusFilter } from "./anomalies";
export { exportAnomaliesCsv, exportFilename } from "./exportCsv";
export { summarizeTenant } from "./summary";
export type { TenantSummary } from "./summary";
