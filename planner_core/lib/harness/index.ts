export { capture, runDeterminismHarness } from './determinismHarness';
export type { DeterminismCapture, DeterminismHarnessOptions, DeterminismReport } from './determinismHarness';
