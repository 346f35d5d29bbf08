export type Step = {
    observation: number[],
    action: number[],
    reward: number,
    done: boolean,
}

export enum TerminalReason {
    OffTrack = 'off_track',
    Completed = 'completed',
    Timeout = 'timeout',
}

export type Episode = {
    readonly id: string,
    readonly workerId: string,
    // per-worker submission index, starting at 0
    readonly sequence: number,
    readonly policyVersion: number,
    readonly steps: readonly Readonly<Step>[],
    readonly totalReward: number,
    readonly stepCount: number,
    readonly terminalReason: TerminalReason,
    // completion percentage of the track, 0..100
    readonly progress: number,
    readonly trial: number,
    readonly startedAt: number,
    readonly sealedAt: number,
    readonly elapsedMs: number,
    readonly isEvaluation: boolean,
}

export type PolicyVersion = {
    readonly version: number,
    readonly weights: Uint8Array,
    readonly createdAt: number,
}

export type TrainingBatch = {
    readonly iteration: number,
    readonly episodes: readonly Episode[],
    readonly versions: readonly number[],
    readonly stepCount: number,
    readonly meanReward: number,
}

export enum JobState {
    Pending = 'pending',
    Running = 'running',
    Converged = 'converged',
    Cancelled = 'cancelled',
    Failed = 'failed',
}

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set([
    JobState.Converged,
    JobState.Cancelled,
    JobState.Failed,
]);

export enum WorkerState {
    Idle = 'idle',
    FetchingPolicy = 'fetching-policy',
    RunningEpisode = 'running-episode',
    Reporting = 'reporting',
    Stopped = 'stopped',
    Failed = 'failed',
}

export type WorkerStatus = {
    workerId: string,
    state: WorkerState,
    timestamp: number,
    episodes: number,
    error?: string,
}

export type MetricSource = 'train' | 'eval';

export type MetricRecord = {
    readonly source: MetricSource,
    readonly kind: 'episode' | 'iteration',
    // episode counter of the origin, or trainer iteration
    readonly index: number,
    // worker id or 'trainer'
    readonly origin: string,
    readonly timestamp: number,
    readonly values: Readonly<Record<string, number>>,
}
