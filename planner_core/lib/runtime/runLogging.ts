import { sha256Hex } from '../identity';

export const PIPELINE_VERSION = '1.0';

export const RUN_INDEX = 'planner_runs';
export const TASK_LOG_INDEX = 'planner_tasklogs';

export type RunLogIndex = typeof RUN_INDEX | typeof TASK_LOG_INDEX;
export type RunStatus = 'RUNNING' | 'SUCCEEDED' | 'FAILED';
export type TaskStatus = 'STARTED' | 'SUCCEEDED' | 'FAILED' | 'SKIPPED';
export type TaskStage = 'NORMALIZE' | 'AGGREGATE' | 'SCORE' | 'PLAN' | 'DIFF' | 'PERSIST' | 'SYSTEM';
export type TaskType = 'RECORD' | 'BATCH' | 'SYSTEM';
export type StageTerminalStatus = Extract<TaskStatus, 'SUCCEEDED' | 'FAILED' | 'SKIPPED'>;

export interface TaskError {
    code: string;
    message: string;
    stack?: string;
    type?: string;
}

export interface BulkUpsertReport {
    attempted: number;
    succeeded: number;
    failed: number;
    firstFailure?: {
        id: string;
        reason: string;
    } | null;
}

export interface RunLogClient {
    bulkUpsert(index: RunLogIndex, documents: Record<string, unknown>[]): Promise<BulkUpsertReport>;
}

export function computeRunId(input: {
    projectPath: string;
    inputDigest: string;
    pipelineVersion?: string;
}): string {
    return sha256Hex([
        input.projectPath,
        input.inputDigest,
        input.pipelineVersion ?? PIPELINE_VERSION,
    ].join('|'));
}

const MAX_MESSAGE_CHARS = 10_000;
const MAX_ERROR_MESSAGE_CHARS = 8_000;
const MAX_STACK_CHARS = 20_000;
const MAX_REFS_CHARS = 50_000;

function truncate(value: string | undefined | null, max: number): string {
    const text = value ?? '';
    if (text.length > max) {
        return `${text.substring(0, max)}...[truncated ${text.length - max} chars]`;
    }
    return text;
}

function boundedRefs(refs: Record<string, unknown> | undefined): Record<string, unknown> {
    if (!refs) return {};
    const encoded = JSON.stringify(refs);
    if (encoded.length > MAX_REFS_CHARS) {
        return { _truncated: true, originalBytes: encoded.length };
    }
    return refs;
}

export function toTaskError(error: unknown): TaskError {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : 'UNEXPECTED';
        return { code, message: error.message, stack: error.stack, type: error.name };
    }
    return { code: 'UNEXPECTED', message: String(error), type: typeof error };
}

/**
 * Writes a run header plus a monotonic sequence of task logs for one pipeline
 * invocation. Sink failures are reported on stderr and never fail the run.
 */
export class PipelineRunLogger {
    private readonly client: RunLogClient;
    private readonly runId: string;
    private readonly projectPath: string;
    private readonly pipelineVersion: string;
    private readonly now: () => number;
    private seq = 0;

    constructor(params: {
        client: RunLogClient;
        runId: string;
        projectPath: string;
        pipelineVersion?: string;
        now?: () => number;
    }) {
        this.client = params.client;
        this.runId = params.runId;
        this.projectPath = params.projectPath;
        this.pipelineVersion = params.pipelineVersion ?? PIPELINE_VERSION;
        this.now = params.now ?? Date.now;
    }

    get sequence(): number {
        return this.seq;
    }

    clock(): number {
        return this.now();
    }

    async writeRun(params: {
        status: RunStatus;
        startedAt: number;
        endedAt: number | null;
        counts: Record<string, number>;
        errorSummary: TaskError | null;
    }): Promise<void> {
        const now = this.now();
        const endedAt = params.endedAt === null ? null : Math.max(params.endedAt, params.startedAt);

        const doc = {
            runId: this.runId,
            projectPath: this.projectPath,
            pipelineVersion: this.pipelineVersion,
            status: params.status,
            startedAt: new Date(params.startedAt).toISOString(),
            endedAt: endedAt === null ? null : new Date(endedAt).toISOString(),
            counts: params.counts,
            errorSummary: params.errorSummary,
            updatedAt: new Date(now).toISOString(),
        };

        await this.send(RUN_INDEX, doc, `run header for runId=${this.runId}`);
    }

    async writeTask(params: {
        stage: TaskStage;
        taskType: TaskType;
        taskKey: string;
        status: TaskStatus;
        message: string;
        startedAt?: number;
        endedAt?: number;
        refs?: Record<string, unknown>;
        error?: TaskError | null;
    }): Promise<void> {
        const startedAt = params.startedAt ?? this.now();
        const endedAt = Math.max(params.endedAt ?? startedAt, startedAt);

        this.seq += 1;
        const errorSource = params.error ?? { code: 'NONE', message: 'none' };

        const doc = {
            runId: this.runId,
            projectPath: this.projectPath,
            seq: this.seq,
            stage: params.stage,
            taskType: params.taskType,
            taskKey: params.taskKey,
            taskId: sha256Hex([this.runId, params.stage, params.taskKey].join('|')),
            status: params.status,
            startedAt: new Date(startedAt).toISOString(),
            endedAt: new Date(endedAt).toISOString(),
            durationMs: endedAt - startedAt,
            message: truncate(params.message, MAX_MESSAGE_CHARS),
            refs: boundedRefs(params.refs),
            error: {
                code: errorSource.code,
                message: truncate(errorSource.message, MAX_ERROR_MESSAGE_CHARS),
                stack: truncate(errorSource.stack, MAX_STACK_CHARS),
                type: errorSource.type ?? 'Error',
            },
        };

        await this.send(TASK_LOG_INDEX, doc, `task log ${params.taskKey}`);
    }

    async writeStageStart(stage: TaskStage, startedAt: number, refs?: Record<string, unknown>): Promise<void> {
        await this.writeTask({
            stage,
            taskType: 'SYSTEM',
            taskKey: `${stage.toLowerCase()}.stage.start`,
            status: 'STARTED',
            message: `${stage} stage started`,
            startedAt,
            endedAt: startedAt,
            refs,
        });
    }

    async writeStageTerminal(params: {
        stage: TaskStage;
        status: StageTerminalStatus;
        startedAt: number;
        endedAt: number;
        refs?: Record<string, unknown>;
        error?: TaskError | null;
    }): Promise<void> {
        await this.writeTask({
            stage: params.stage,
            taskType: 'SYSTEM',
            taskKey: `${params.stage.toLowerCase()}.stage.end`,
            status: params.status,
            message: `${params.stage} stage ${params.status.toLowerCase()}`,
            startedAt: params.startedAt,
            endedAt: params.endedAt,
            refs: params.refs,
            error: params.error ?? null,
        });
    }

    private async send(index: RunLogIndex, doc: Record<string, unknown>, label: string): Promise<void> {
        try {
            const report = await this.client.bulkUpsert(index, [doc]);
            if (report.failed > 0) {
                console.error(`[PipelineRunLogger] Failed to write ${label}. First failure: ${report.firstFailure?.reason ?? 'unknown'}`);
            }
        } catch (error) {
            console.error(`[PipelineRunLogger] Critical error writing ${label}:`, error);
        }
    }
}

/** Prints one line per document; used by the CLI when no other sink is set. */
export class ConsoleRunLogClient implements RunLogClient {
    async bulkUpsert(index: RunLogIndex, documents: Record<string, unknown>[]): Promise<BulkUpsertReport> {
        for (const doc of documents) {
            const status = typeof doc.status === 'string' ? doc.status : '';
            const label = typeof doc.taskKey === 'string' ? doc.taskKey : String(doc.runId);
            const message = typeof doc.message === 'string' ? ` ${doc.message}` : '';
            console.log(`[${index}] ${status} ${label}${message}`);
        }
        return { attempted: documents.length, succeeded: documents.length, failed: 0 };
    }
}
