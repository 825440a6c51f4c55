export { loadPlannerConfig } from './loadConfig';
export { ConfigLoadError } from './errors';
export type { ConfigLoadErrorCode } from './errors';
export { DEFAULT_STATE_DIR, PlannerConfigFileSchema } from './types';
export type { LoadPlannerConfigOptions, PlannerConfig, PlannerConfigFile } from './types';
