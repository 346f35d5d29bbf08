import { Config } from '../../rl-common/config.ts';
import { MemoryMetricsAggregator, MetricsAggregator } from '../../rl-common/Metrics/MetricsAggregator.ts';
import { ObjectStorage } from '../../rl-common/Storage/ObjectStorage.ts';
import {
    createSupabaseClient,
    readSupabaseSettings,
    SupabaseObjectStorage,
} from '../../rl-common/Storage/supabaseStorage.ts';
import { PolicyVersion } from '../../rl-common/types.ts';
import { MemoryStopSignal, StopSignal, StorageStopSignal } from './Control/StopSignal.ts';
import { MemoryWorkerStatusBoard, StorageWorkerStatusBoard, WorkerStatusBoard } from './Control/WorkerStatusBoard.ts';
import { ExperienceChannel } from './Experience/ExperienceChannel.ts';
import { MemoryExperienceChannel } from './Experience/MemoryExperienceChannel.ts';
import { StorageExperienceChannel } from './Experience/StorageExperienceChannel.ts';
import { StorageMetricsAggregator } from './Metrics/StorageMetricsAggregator.ts';
import { MemoryPolicyChannel } from './Policy/MemoryPolicyChannel.ts';
import { PolicyChannel } from './Policy/PolicyChannel.ts';
import { StoragePolicyChannel } from './Policy/StoragePolicyChannel.ts';

// Everything a trainer and its workers share. Nothing else crosses an actor boundary.
export type ChannelSet = {
    experience: ExperienceChannel,
    policies: PolicyChannel,
    metrics: MetricsAggregator,
    stop: StopSignal,
    statuses: WorkerStatusBoard,
}

type ChannelOptions = {
    initialPolicy?: PolicyVersion,
}

export function createMemoryChannels(config: Config, { initialPolicy }: ChannelOptions = {}): ChannelSet {
    return {
        experience: new MemoryExperienceChannel(config.experienceBufferSize),
        policies: new MemoryPolicyChannel({ retention: config.policyRetention, initial: initialPolicy }),
        metrics: new MemoryMetricsAggregator(),
        stop: new MemoryStopSignal(),
        statuses: new MemoryWorkerStatusBoard(),
    };
}

export function createStorageChannels(
    config: Config,
    storage: ObjectStorage,
    { initialPolicy }: ChannelOptions = {},
): ChannelSet {
    return {
        experience: new StorageExperienceChannel(storage, config.experienceBufferSize),
        policies: new StoragePolicyChannel(storage, config.policyRetention, initialPolicy),
        metrics: new StorageMetricsAggregator(storage),
        stop: new StorageStopSignal(storage),
        statuses: new StorageWorkerStatusBoard(storage),
    };
}

/**
 * Channels over a Supabase Storage bucket, for a trainer and workers running as separate processes.
 * Reads SUPABASE_URL, SUPABASE_KEY, SUPABASE_BUCKET and RL_EXPERIMENT.
 */
export function createSupabaseChannels(
    config: Config,
    env: NodeJS.ProcessEnv = process.env,
    options: ChannelOptions = {},
): { channels: ChannelSet, storage: ObjectStorage } {
    const settings = readSupabaseSettings(env);
    const storage = new SupabaseObjectStorage(createSupabaseClient(settings), settings.bucket, settings.experiment);

    return { channels: createStorageChannels(config, storage, options), storage };
}
