export { runPlannerCli, summarize } from './plannerCli';
export { runDeterminismCli } from './determinismCli';
export type { PlannerCliOptions, PlannerCliResult } from './plannerCli';
export { CliUsageError } from './errors';
export type { CliUsageErrorCode } from './errors';
