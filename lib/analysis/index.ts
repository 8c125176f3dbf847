export { executeDetection, runDetection } from "./runDetection";
export type { DetectionDeps } from "./runDetection";
export { createDetectionRunner } from "./runner";
export type { DetectionRunner } from "./runner";
export { computeBaselines, summarizeAmounts } from "./baselines";
export { DETECTORS } from "./detectors";
export type { DetectionContext, DetectionStage, DetectionSummary, Detector } from "./types";
