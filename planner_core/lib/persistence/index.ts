export { decodePlan, encodePlan, serializePersistedPlan, toPersistedPlan } from './encodePlan';
export { FilePlanStore, InMemoryPlanStore, planKey } from './planStore';
export type { FilePlanStoreOptions, PlanStore } from './planStore';
export {
    PLAN_SCHEMA_VERSION,
    PersistedFindingSchema,
    PersistedFixActionSchema,
    PersistedPlanSchema,
} from './schema';
export type {
    PersistedAsset,
    PersistedFinding,
    PersistedFixAction,
    PersistedPhase,
    PersistedPlan,
    PersistedTestSpec,
    PersistedWarning,
} from './schema';
export { PlanDecodeError } from './errors';
export type { PlanDecodeErrorCode } from './errors';
