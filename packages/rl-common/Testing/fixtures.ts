import { PolicyUpdater } from '../../rl-trainer/src/types.ts';
import { AgentFactory, Simulator, StepResult } from '../../rl-worker/src/types.ts';
import { Config, ConfigInput, parseConfig } from '../config.ts';
import { EpisodeMemory } from '../Episode/EpisodeMemory.ts';
import { Episode, PolicyVersion, TerminalReason, TrainingBatch } from '../types.ts';

export function createTestConfig(overrides: Partial<ConfigInput> = {}): Config {
    return parseConfig({
        minBatchSize: 2,
        maxBatchWaitMs: 1_000,
        staleVersionLag: 10,
        pollIntervalMs: 2,
        maxStepsPerEpisode: 10,
        episodeTimeoutMs: 1_000,
        experienceBufferSize: 100,
        highWaterMark: 80,
        retry: { retries: 3, initialDelayMs: 1, maxDelayMs: 2 },
        ...overrides,
    });
}

export type EpisodeFixture = {
    workerId?: string,
    sequence?: number,
    policyVersion?: number,
    rewards?: number[],
    terminalReason?: TerminalReason,
    sealedAt?: number,
}

// One step per reward; the last step ends the episode.
export function createEpisode({
    workerId = 'worker-0',
    sequence = 0,
    policyVersion = 0,
    rewards = [1],
    terminalReason = TerminalReason.Completed,
    sealedAt,
}: EpisodeFixture = {}): Episode {
    const startedAt = 1_000 + sequence * 10;
    const memory = new EpisodeMemory({ workerId, sequence, policyVersion, trial: 1, startedAt, isEvaluation: false });

    rewards.forEach((reward, i) => {
        memory.addStep({ observation: [i], action: [0], reward, done: i === rewards.length - 1 });
    });

    return memory.seal(terminalReason, sealedAt ?? startedAt + rewards.length);
}

export function createPolicy(version: number, weights: number[] = [version]): PolicyVersion {
    return { version, weights: new Uint8Array(weights), createdAt: version };
}

export type TrackOptions = {
    // steps to reach the finish line
    length?: number,
    reward?: number,
    offTrackAt?: number,
    onReset?: (resets: number) => void | Promise<void>,
    onStep?: () => void,
}

// A straight track: every step moves the car one cell forward.
export class TrackSimulator implements Simulator {
    public resets = 0;
    public steps = 0;

    private position = 0;

    constructor(private readonly options: TrackOptions = {}) {
    }

    async reset(): Promise<number[]> {
        this.resets++;
        this.position = 0;
        await this.options.onReset?.(this.resets);

        return [0];
    }

    step(): StepResult {
        const { length = 3, reward = 1, offTrackAt } = this.options;

        this.steps++;
        this.position++;
        this.options.onStep?.();

        const offTrack = offTrackAt !== undefined && this.position >= offTrackAt;

        return {
            observation: [this.position],
            reward,
            done: offTrack || this.position >= length,
            offTrack,
            progress: Math.min(100, this.position * 100 / length),
        };
    }
}

export const createConstantAgent: AgentFactory = (policy) => ({
    act: () => [policy.version],
});

// Weights are the version they were produced for.
export class CountingUpdater implements PolicyUpdater {
    public readonly batches: TrainingBatch[] = [];

    initialWeights(): Uint8Array {
        return new Uint8Array([0]);
    }

    update(policy: PolicyVersion, batch: TrainingBatch): Uint8Array | Promise<Uint8Array> {
        this.batches.push(batch);
        return new Uint8Array([policy.version + 1]);
    }
}
