/**
 * Coordination of a policy trainer and simulator rollout workers.
 *
 * Actors share nothing but a {@link ChannelSet}: experience flows from workers to the
 * trainer, versioned policies flow back, metrics and control signals flow beside them.
 */

export { runLocalJob, getWorkerId, type LocalJobOptions, type LocalJobResult } from './runLocalJob.ts';
export { runTrainerProcess, runWorkerProcess } from './processes.ts';

export { Trainer, type TrainerOptions } from '../../rl-trainer/src/Learner/Trainer.ts';
export { BatchAssembler } from '../../rl-trainer/src/Learner/BatchAssembler.ts';
export { ConvergenceTracker, type ConvergenceCriteria } from '../../rl-trainer/src/Learner/ConvergenceTracker.ts';
export type { PolicyUpdater } from '../../rl-trainer/src/types.ts';

export { RolloutWorker, type RolloutWorkerOptions } from '../../rl-worker/src/Actor/RolloutWorker.ts';
export { PolicyCache } from '../../rl-worker/src/Actor/PolicyCache.ts';
export type { Agent, AgentFactory, Simulator, StepResult } from '../../rl-worker/src/types.ts';

export {
    createMemoryChannels,
    createStorageChannels,
    createSupabaseChannels,
    type ChannelSet,
} from '../../rl-channels/src/createChannels.ts';
export type { ExperienceChannel } from '../../rl-channels/src/Experience/ExperienceChannel.ts';
export { MemoryExperienceChannel } from '../../rl-channels/src/Experience/MemoryExperienceChannel.ts';
export { StorageExperienceChannel } from '../../rl-channels/src/Experience/StorageExperienceChannel.ts';
export { PolicyReader, type PolicyChannel } from '../../rl-channels/src/Policy/PolicyChannel.ts';
export { MemoryPolicyChannel } from '../../rl-channels/src/Policy/MemoryPolicyChannel.ts';
export { StoragePolicyChannel } from '../../rl-channels/src/Policy/StoragePolicyChannel.ts';
export { MemoryStopSignal, StorageStopSignal, type StopNotice, type StopSignal } from '../../rl-channels/src/Control/StopSignal.ts';
export {
    MemoryWorkerStatusBoard,
    StorageWorkerStatusBoard,
    type WorkerStatusBoard,
} from '../../rl-channels/src/Control/WorkerStatusBoard.ts';
export {
    ManualJobController,
    StorageJobController,
    type JobLifecycleController,
    type JobReport,
} from '../../rl-channels/src/Control/JobController.ts';
export { StorageMetricsAggregator } from '../../rl-channels/src/Metrics/StorageMetricsAggregator.ts';

export { loadConfig, parseConfig, type Config, type ConfigInput } from '../../rl-common/config.ts';
export * from '../../rl-common/errors.ts';
export * from '../../rl-common/types.ts';
export { EpisodeMemory, freezeEpisode, isSealedEpisode } from '../../rl-common/Episode/EpisodeMemory.ts';
export { MemoryMetricsAggregator, type MetricsAggregator } from '../../rl-common/Metrics/MetricsAggregator.ts';
export { exportMetrics, type MetricExport } from '../../rl-common/Metrics/exportMetrics.ts';
export { MemoryObjectStorage, type ObjectStorage } from '../../rl-common/Storage/ObjectStorage.ts';
export { SupabaseObjectStorage } from '../../rl-common/Storage/supabaseStorage.ts';
