export { diffPlans } from './diffPlans';
export type { DiffablePlan, PlanDiff, PlanDiffCounts, PlanDiffEntry, RescoredDiffEntry } from './types';
