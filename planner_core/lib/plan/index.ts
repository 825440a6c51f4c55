export { build, comparePlannedOrder, phaseForScore } from './buildPlan';
export { DEFAULT_FIX_STRATEGIES, detectIacFormat, requiresManualReview, selectFixAction } from './fixActions';
export { quoteShellArg } from './shell';
export { buildVerificationTests } from './verificationTests';
export { UnsupportedAssetKindError } from './errors';
export type { UnsupportedAssetKindErrorCode } from './errors';
export { UNKNOWN_GENERATED_AT } from './types';
export type { BuildPlanOptions, FixStrategy, FixStrategyTable, PlanBuildConfig } from './types';
