export { ASSET_KINDS, formatAssetRef, isAssetKind } from './asset';
export type { Asset, AssetKind, AssetTags, CriticalityTag, ExposureTag } from './asset';
export { isGhsaRecord, isKevRecord, isNvdRecord, isOsvRecord } from './feed';
export type {
    FeedReference,
    GenericFeedRecord,
    GhsaRecord,
    GhsaSeverity,
    KevRecord,
    NvdRecord,
    OsvRecord,
    OsvSeverityEntry,
    RawFindingRecord,
    RawFindingRecordBase,
} from './feed';
export { PHASE_TIERS } from './finding';
export type {
    AssetTier,
    ExploitabilityTier,
    Finding,
    PhaseTier,
    PlannedFinding,
    RiskReasonCode,
    ScoreBreakdown,
    ScoredFinding,
    TestOutcome,
    VerificationPhase,
    VerificationRunPoint,
    VerificationTests,
    VerificationTestSpec,
} from './finding';
export type {
    ContainerImageFixAction,
    DependencyFixAction,
    FixAction,
    IacFormat,
    IacResourceFixAction,
    SecretExposureFixAction,
} from './fix';
export type { PlanWarning, PlanWarningCode, RemediationPhase, RemediationPlan } from './plan';
