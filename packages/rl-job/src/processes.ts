import { createConsole } from '../../../lib/console.ts';
import { StorageJobController } from '../../rl-channels/src/Control/JobController.ts';
import { createSupabaseChannels } from '../../rl-channels/src/createChannels.ts';
import { loadConfig } from '../../rl-common/config.ts';
import { JobState, WorkerState } from '../../rl-common/types.ts';
import { RolloutWorker } from '../../rl-worker/src/Actor/RolloutWorker.ts';
import { AgentFactory, Simulator } from '../../rl-worker/src/types.ts';
import { Trainer } from '../../rl-trainer/src/Learner/Trainer.ts';
import { PolicyUpdater } from '../../rl-trainer/src/types.ts';

const logger = createConsole('[JOB]');

/**
 * Trainer process over Supabase storage. Configuration is read once; an invalid one
 * throws ConfigInvalidError before the job enters Running. SIGINT/SIGTERM cancel
 * at the next iteration boundary.
 */
export async function runTrainerProcess({ updater }: { updater: PolicyUpdater }): Promise<JobState> {
    const config = loadConfig();
    const { channels, storage } = createSupabaseChannels(config);
    const trainer = new Trainer({ config, channels, updater, controller: new StorageJobController(storage) });

    const cancel = () => {
        logger.info('🛑 Shutting down at the next iteration boundary...');
        trainer.cancel();
    };

    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);

    try {
        return await trainer.run();
    } finally {
        process.off('SIGINT', cancel);
        process.off('SIGTERM', cancel);
    }
}

/**
 * Rollout worker process over Supabase storage. It stops when the trainer raises the
 * stop signal, or after the current episode on SIGINT/SIGTERM.
 */
export async function runWorkerProcess({ workerId, simulator, createAgent }: {
    workerId: string,
    simulator: Simulator,
    createAgent: AgentFactory,
}): Promise<WorkerState> {
    const config = loadConfig();
    const { channels } = createSupabaseChannels(config);
    const worker = new RolloutWorker({ workerId, config, channels, simulator, createAgent });
    const stop = () => worker.stop('Shutting down after the current episode');

    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
        return await worker.start();
    } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
    }
}
