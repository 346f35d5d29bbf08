import { JobLifecycleController, ManualJobController } from '../../rl-channels/src/Control/JobController.ts';
import { ChannelSet, createMemoryChannels } from '../../rl-channels/src/createChannels.ts';
import { Config } from '../../rl-common/config.ts';
import { exportMetrics, MetricExport } from '../../rl-common/Metrics/exportMetrics.ts';
import { JobState, WorkerState } from '../../rl-common/types.ts';
import { RolloutWorker } from '../../rl-worker/src/Actor/RolloutWorker.ts';
import { AgentFactory, Simulator } from '../../rl-worker/src/types.ts';
import { Trainer } from '../../rl-trainer/src/Learner/Trainer.ts';
import { PolicyUpdater } from '../../rl-trainer/src/types.ts';

export type LocalJobOptions = {
    config: Config,
    createSimulator: (workerIndex: number) => Simulator,
    createAgent: AgentFactory,
    updater: PolicyUpdater,
    channels?: ChannelSet,
    controller?: JobLifecycleController,
    now?: () => number,
}

export type LocalJobResult = {
    state: JobState,
    iterations: number,
    policyVersion: undefined | number,
    workers: Record<string, WorkerState>,
    metrics: MetricExport[],
}

export function getWorkerId(index: number) {
    return `worker-${index}`;
}

/**
 * One trainer and `config.workerCount` workers in this process. They still only talk
 * through the channel set, so the same actors run unchanged over storage-backed channels.
 */
export async function runLocalJob(options: LocalJobOptions): Promise<LocalJobResult> {
    const { config, now } = options;
    const channels = options.channels ?? createMemoryChannels(config);
    const controller = options.controller ?? new ManualJobController();

    const trainer = new Trainer({ config, channels, updater: options.updater, controller, now });
    const workers = Array.from({ length: config.workerCount }, (_, index) => new RolloutWorker({
        workerId: getWorkerId(index),
        config,
        channels,
        simulator: options.createSimulator(index),
        createAgent: options.createAgent,
        now,
    }));

    const [state, ...workerStates] = await Promise.all([
        trainer.run(),
        ...workers.map((worker) => worker.start()),
    ]);

    return {
        state,
        iterations: trainer.getIteration(),
        policyVersion: trainer.getPolicyVersion(),
        workers: Object.fromEntries(workers.map((worker, i) => [worker.workerId, workerStates[i]])),
        metrics: exportMetrics(await channels.metrics.snapshot()),
    };
}
