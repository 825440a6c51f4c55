export {
    ConsoleRunLogClient,
    PIPELINE_VERSION,
    PipelineRunLogger,
    RUN_INDEX,
    TASK_LOG_INDEX,
    computeRunId,
    toTaskError,
} from './runLogging';
export type {
    BulkUpsertReport,
    RunLogClient,
    RunLogIndex,
    RunStatus,
    StageTerminalStatus,
    TaskError,
    TaskStage,
    TaskStatus,
    TaskType,
} from './runLogging';
