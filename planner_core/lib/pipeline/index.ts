export { computeInputDigest, findMissingSources, resolveGeneratedAt, runRemediationPipeline } from './runPipeline';
export { mapWithConcurrency } from './concurrency';
export { DEFAULT_CONCURRENCY } from './types';
export type { PipelineInput, PipelineOptions, PipelineResult } from './types';
