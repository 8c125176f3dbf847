export { computeBaselines } from "./computeBaselines";
export { summarizeAmounts } from "./stats";
export type { AmountStats } from "./stats";
