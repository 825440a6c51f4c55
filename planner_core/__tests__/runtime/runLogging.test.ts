import { sha256Hex } from '../../lib/identity';
import {
    ConsoleRunLogClient,
    PipelineRunLogger,
    RUN_INDEX,
    TASK_LOG_INDEX,
    computeRunId,
    toTaskError,
} from '../../lib/runtime';
import { InMemoryRunLogClient } from '../../lib/testing';

const T0 = 1700000000000;

function makeLogger(client: InMemoryRunLogClient): PipelineRunLogger {
    return new PipelineRunLogger({
        client,
        runId: 'run-1',
        projectPath: '/projects/demo',
        now: () => T0,
    });
}

describe('computeRunId', () => {
    it('hashes project, input digest and pipeline version', () => {
        const runId = computeRunId({ projectPath: '/projects/demo', inputDigest: 'digest-a' });

        expect(runId).toBe(sha256Hex('/projects/demo|digest-a|1.0'));
        expect(computeRunId({ projectPath: '/projects/demo', inputDigest: 'digest-a' })).toBe(runId);
        expect(computeRunId({ projectPath: '/projects/demo', inputDigest: 'digest-b' })).not.toBe(runId);
        expect(computeRunId({ projectPath: '/projects/demo', inputDigest: 'digest-a', pipelineVersion: '2.0' })).not.toBe(runId);
    });
});

describe('PipelineRunLogger', () => {
    it('writes a run header and a monotonic task sequence', async () => {
        const client = new InMemoryRunLogClient();
        const logger = makeLogger(client);

        await logger.writeRun({ status: 'RUNNING', startedAt: T0, endedAt: null, counts: {}, errorSummary: null });
        await logger.writeStageStart('SCORE', T0, { findings: 3 });
        await logger.writeStageTerminal({ stage: 'SCORE', status: 'SUCCEEDED', startedAt: T0, endedAt: T0 + 250 });

        expect(client.list(RUN_INDEX)).toEqual([{
            runId: 'run-1',
            projectPath: '/projects/demo',
            pipelineVersion: '1.0',
            status: 'RUNNING',
            startedAt: '2023-11-14T22:13:20.000Z',
            endedAt: null,
            counts: {},
            errorSummary: null,
            updatedAt: '2023-11-14T22:13:20.000Z',
        }]);

        const tasks = client.list(TASK_LOG_INDEX);
        expect(tasks.map((task) => task.seq)).toEqual([1, 2]);
        expect(tasks.map((task) => task.taskKey)).toEqual(['score.stage.start', 'score.stage.end']);
        expect(tasks[0]).toMatchObject({ status: 'STARTED', message: 'SCORE stage started', refs: { findings: 3 } });
        expect(tasks[1]).toMatchObject({
            stage: 'SCORE',
            taskType: 'SYSTEM',
            taskId: sha256Hex('run-1|SCORE|score.stage.end'),
            status: 'SUCCEEDED',
            message: 'SCORE stage succeeded',
            durationMs: 250,
            refs: {},
            error: { code: 'NONE', message: 'none', stack: '', type: 'Error' },
        });
        expect(logger.sequence).toBe(2);
    });

    it('never reports a negative duration', async () => {
        const client = new InMemoryRunLogClient();

        await makeLogger(client).writeTask({
            stage: 'AGGREGATE',
            taskType: 'RECORD',
            taskKey: 'record.nvd.CVE-2024-0001.express',
            status: 'SKIPPED',
            message: 'no match',
            startedAt: 1000,
            endedAt: 500,
        });

        expect(client.list(TASK_LOG_INDEX)[0]).toMatchObject({ durationMs: 0, endedAt: '1970-01-01T00:00:01.000Z' });
    });

    it('bounds oversized messages and refs', async () => {
        const client = new InMemoryRunLogClient();

        await makeLogger(client).writeTask({
            stage: 'PLAN',
            taskType: 'BATCH',
            taskKey: 'plan.large',
            status: 'SUCCEEDED',
            message: 'x'.repeat(10_005),
            refs: { blob: 'y'.repeat(50_001) },
        });

        const [task] = client.list(TASK_LOG_INDEX);
        expect(task.message).toBe(`${'x'.repeat(10_000)}...[truncated 5 chars]`);
        expect(task.refs).toEqual({ _truncated: true, originalBytes: 50_012 });
    });

    it('reports sink failures without failing the caller', async () => {
        const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const client = new InMemoryRunLogClient();
        const logger = makeLogger(client);

        client.throwOnBulk = true;
        await expect(logger.writeRun({ status: 'FAILED', startedAt: T0, endedAt: T0, counts: {}, errorSummary: null })).resolves.toBeUndefined();

        client.throwOnBulk = false;
        client.failIndexes.add(TASK_LOG_INDEX);
        await logger.writeTask({ stage: 'SYSTEM', taskType: 'SYSTEM', taskKey: 't.1', status: 'FAILED', message: 'boom' });

        expect(errors).toHaveBeenNthCalledWith(1, '[PipelineRunLogger] Critical error writing run header for runId=run-1:', expect.any(Error));
        expect(errors).toHaveBeenNthCalledWith(2, '[PipelineRunLogger] Failed to write task log t.1. First failure: rejected');
        expect(client.list(TASK_LOG_INDEX)).toEqual([]);
        errors.mockRestore();
    });
});

describe('toTaskError', () => {
    it('keeps the code of domain errors', () => {
        const error = Object.assign(new Error('weights are off'), { code: 'WEIGHTS_DO_NOT_SUM_TO_ONE' });
        error.name = 'InvalidWeightsError';

        expect(toTaskError(error)).toMatchObject({ code: 'WEIGHTS_DO_NOT_SUM_TO_ONE', message: 'weights are off', type: 'InvalidWeightsError' });
        expect(toTaskError(new Error('plain'))).toMatchObject({ code: 'UNEXPECTED', type: 'Error' });
        expect(toTaskError('boom')).toEqual({ code: 'UNEXPECTED', message: 'boom', type: 'string' });
    });
});

describe('ConsoleRunLogClient', () => {
    it('prints one line per document', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        const report = await new ConsoleRunLogClient().bulkUpsert(TASK_LOG_INDEX, [
            { status: 'SKIPPED', taskKey: 'record.osv.PYSEC-2099-1.django', message: 'no match' },
        ]);
        await new ConsoleRunLogClient().bulkUpsert(RUN_INDEX, [{ runId: 'run-1', status: 'RUNNING' }]);

        expect(report).toEqual({ attempted: 1, succeeded: 1, failed: 0 });
        expect(log.mock.calls).toEqual([
            ['[planner_tasklogs] SKIPPED record.osv.PYSEC-2099-1.django no match'],
            ['[planner_runs] RUNNING run-1'],
        ]);
        log.mockRestore();
    });
});
