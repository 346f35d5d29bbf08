import { firstValueFrom } from 'rxjs';
import { describe, expect, it } from 'vitest';
import { MemoryObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { JobState, WorkerState } from '../../../rl-common/types.ts';
import { ManualJobController, StorageJobController } from './JobController.ts';
import { MemoryStopSignal, StopSignal, StorageStopSignal } from './StopSignal.ts';
import { MemoryWorkerStatusBoard, StorageWorkerStatusBoard, WorkerStatusBoard } from './WorkerStatusBoard.ts';

const stopSignals: { name: string, create: () => StopSignal }[] = [
    { name: 'MemoryStopSignal', create: () => new MemoryStopSignal() },
    { name: 'StorageStopSignal', create: () => new StorageStopSignal(new MemoryObjectStorage()) },
];

describe.each(stopSignals)('$name', ({ create }) => {
    it('keeps the first stop request', async () => {
        const signal = create();

        expect(await signal.read()).toBeUndefined();

        await signal.requestStop({ reason: 'job converged', requestedAt: 1 });
        await signal.requestStop({ reason: 'job cancelled', requestedAt: 2 });

        expect(await signal.read()).toEqual({ reason: 'job converged', requestedAt: 1 });
    });
});

const boards: { name: string, create: () => WorkerStatusBoard }[] = [
    { name: 'MemoryWorkerStatusBoard', create: () => new MemoryWorkerStatusBoard() },
    { name: 'StorageWorkerStatusBoard', create: () => new StorageWorkerStatusBoard(new MemoryObjectStorage()) },
];

describe.each(boards)('$name', ({ create }) => {
    it('keeps the latest status of every worker', async () => {
        const board = create();

        await board.report({ workerId: 'worker/0', state: WorkerState.Idle, timestamp: 1, episodes: 0 });
        await board.report({ workerId: 'worker-1', state: WorkerState.Idle, timestamp: 1, episodes: 0 });
        await board.report({
            workerId: 'worker/0',
            state: WorkerState.Failed,
            timestamp: 2,
            episodes: 3,
            error: 'Worker worker/0 exhausted its retry budget: down',
        });

        const statuses = await board.statuses();

        expect(statuses).toHaveLength(2);
        expect(statuses).toContainEqual({
            workerId: 'worker/0',
            state: WorkerState.Failed,
            timestamp: 2,
            episodes: 3,
            error: 'Worker worker/0 exhausted its retry budget: down',
        });
        expect(statuses).toContainEqual({ workerId: 'worker-1', state: WorkerState.Idle, timestamp: 1, episodes: 0 });
    });
});

describe('ManualJobController', () => {
    it('reports completion once', async () => {
        const controller = new ManualJobController();
        const report = firstValueFrom(controller.report$);

        expect(await controller.isCancelRequested()).toBe(false);
        controller.cancel();
        expect(await controller.isCancelRequested()).toBe(true);

        await controller.reportCompletion({
            state: JobState.Cancelled,
            iterations: 2,
            policyVersion: 2,
            reason: 'cancel requested',
            metrics: [],
        });

        expect(await report).toMatchObject({ state: JobState.Cancelled, iterations: 2 });
    });
});

describe('StorageJobController', () => {
    it('shares cancellation and the final report through storage', async () => {
        const storage = new MemoryObjectStorage();
        const scheduler = new StorageJobController(storage);
        const trainerSide = new StorageJobController(storage);

        expect(await trainerSide.isCancelRequested()).toBe(false);
        await scheduler.requestCancel(5);
        expect(await trainerSide.isCancelRequested()).toBe(true);

        await trainerSide.reportCompletion({
            state: JobState.Cancelled,
            iterations: 1,
            policyVersion: 1,
            reason: 'cancel requested',
            metrics: [{ iteration: 1, timestamp: 3, mean_reward: 0.5 }],
        });

        const text = await storage.download('report', 'final.json');
        expect(JSON.parse(text ?? '{}')).toEqual({
            state: 'cancelled',
            iterations: 1,
            policyVersion: 1,
            reason: 'cancel requested',
            metrics: [{ iteration: 1, timestamp: 3, mean_reward: 0.5 }],
        });
    });
});
