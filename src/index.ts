export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./config/metrics.js";
export * from "./graph/adapter.js";
export * from "./graph/model.js";
export * from "./graph/descriptor.js";
export { validateMode, validateNode, validateNodes, isTieMode } from "./metrics/validation.js";
export { egoAlters, modeDirection, readTieWeight } from "./metrics/ties.js";
export { investment, investmentSum, investmentSumFromCache, buildInvestmentCache } from "./metrics/investment.js";
export type { InvestmentCache } from "./metrics/investment.js";
export { constraint, dyadicConstraint } from "./metrics/constraint.js";
export * from "./brokerage/roles.js";
export * from "./brokerage/groups.js";
export * from "./brokerage/classify.js";
export * from "./analysis/report.js";
