import { duplicateDetector } from "./duplicateBills";
import { priceOutlierDetector } from "./priceOutlier";
import { roundNumberDetector } from "./roundNumber";
import type { Detector } from "../types";

export { detectDuplicateBills, duplicateDetector, duplicateSeverity } from "./duplicateBills";
export {
  detectPriceOutliers,
  priceOutlierDetector,
  outlierSeverity,
  outlierConfidence,
} from "./priceOutlier";
export { detectRoundNumbers, roundNumberDetector, isRoundAmount } from "./roundNumber";

/** Run order matters only for logging; each detector is independent. */
export const DETECTORS: readonly Detector[] = [
  duplicateDetector,
  priceOutlierDetector,
  roundNumberDetector,
];
