import { BehaviorSubject } from 'rxjs';
import { createConsole } from '../../../../lib/console.ts';
import { retryWithBackoff, RetryExhaustedError, sleep } from '../../../../lib/retry.ts';
import { JobLifecycleController } from '../../../rl-channels/src/Control/JobController.ts';
import { ChannelSet } from '../../../rl-channels/src/createChannels.ts';
import { Config } from '../../../rl-common/config.ts';
import { describeError, isRetryable, NotReadyError, TrainerUnreachableError } from '../../../rl-common/errors.ts';
import { exportMetrics } from '../../../rl-common/Metrics/exportMetrics.ts';
import { JobState, PolicyVersion, TrainingBatch, WorkerState } from '../../../rl-common/types.ts';
import { PolicyUpdater } from '../types.ts';
import { BatchAssembler } from './BatchAssembler.ts';
import { ConvergenceTracker } from './ConvergenceTracker.ts';

export type TrainerOptions = {
    config: Config,
    channels: ChannelSet,
    updater: PolicyUpdater,
    controller: JobLifecycleController,
    now?: () => number,
}

type Outcome = {
    state: JobState.Converged | JobState.Cancelled | JobState.Failed,
    reason: string,
}

type Collected =
    | { kind: 'batch', batch: TrainingBatch, stats: BatchStats }
    | { kind: 'stopped', outcome: Outcome };

type BatchStats = {
    staleDropped: number,
    versionLag: number,
    waitTime: number,
    pending: number,
}

const logger = createConsole('[TRAINER]');

export class Trainer {
    public readonly state$ = new BehaviorSubject<JobState>(JobState.Pending);

    protected readonly now: () => number;
    protected readonly convergence: ConvergenceTracker;

    protected policy: undefined | PolicyVersion;
    protected iteration = 0;
    protected staleDropped = 0;
    protected cancelRequested = false;

    constructor(protected readonly options: TrainerOptions) {
        this.now = options.now ?? Date.now;
        this.convergence = new ConvergenceTracker(options.config);
    }

    public getState(): JobState {
        return this.state$.getValue();
    }

    public getIteration(): number {
        return this.iteration;
    }

    public getStaleDropped(): number {
        return this.staleDropped;
    }

    public getPolicyVersion(): undefined | number {
        return this.policy?.version;
    }

    // Honoured at the next iteration boundary, like a cancel from the job controller.
    public cancel() {
        this.cancelRequested = true;
    }

    public async run(): Promise<JobState> {
        if (this.getState() !== JobState.Pending) {
            throw new Error(`Trainer already ${this.getState()}`);
        }

        let outcome: Outcome;

        try {
            this.policy = await this.bootstrapPolicy();
            this.setState(JobState.Running);
            logger.info(`🚀 Training from policy v${this.policy.version}`);

            outcome = await this.loop(this.policy);
        } catch (error) {
            logger.error('❌ Training failed:', describeError(error));
            outcome = { state: JobState.Failed, reason: describeError(error) };
        }

        return this.complete(outcome);
    }

    protected async loop(initial: PolicyVersion): Promise<Outcome> {
        let policy = initial;

        while (true) {
            const stopped = await this.checkBoundary();
            if (stopped !== undefined) return stopped;

            const collected = await this.collectBatch(policy.version);
            if (collected.kind === 'stopped') return collected.outcome;

            policy = await this.runIteration(policy, collected.batch, collected.stats);

            const converged = this.convergence.check();
            if (converged !== undefined) {
                return { state: JobState.Converged, reason: converged };
            }
        }
    }

    // Resumes from the newest published policy, or publishes v0.
    protected async bootstrapPolicy(): Promise<PolicyVersion> {
        const { policies } = this.options.channels;

        try {
            return await this.withRetry('fetch latest policy', () => policies.fetchLatest());
        } catch (error) {
            if (!(error instanceof NotReadyError)) throw error;
        }

        const initial: PolicyVersion = {
            version: 0,
            weights: await this.options.updater.initialWeights(),
            createdAt: this.now(),
        };

        await this.withRetry('publish initial policy', () => policies.publish(initial));
        return initial;
    }

    protected async checkBoundary(): Promise<undefined | Outcome> {
        if (await this.isCancelRequested()) {
            return { state: JobState.Cancelled, reason: 'cancel requested' };
        }
        if (await this.allWorkersFailed()) {
            return { state: JobState.Failed, reason: 'every rollout worker failed' };
        }

        return undefined;
    }

    protected async collectBatch(currentVersion: number): Promise<Collected> {
        const { config, channels } = this.options;
        const assembler = new BatchAssembler(config.minBatchSize, config.staleVersionLag);
        const startedAt = this.now();
        let windowStart = startedAt;
        let pending = 0;
        let throttled = false;

        while (true) {
            // a batch is never full here: a full one goes straight to its iteration
            if (await this.isCancelRequested()) {
                const discarded = assembler.discard();
                logger.info(`🛑 Cancel requested, discarding ${discarded} accumulated episodes`);
                return { kind: 'stopped', outcome: { state: JobState.Cancelled, reason: 'cancel requested' } };
            }

            pending = await this.withRetry('read pending experience', () => channels.experience.pending());

            // past the high-water mark only what the batch still lacks is drained
            const overHighWaterMark = pending > config.highWaterMark;
            const limit = overHighWaterMark ? config.minBatchSize : config.maxBatchSize;
            const wanted = limit - assembler.size();

            if (overHighWaterMark && !throttled) {
                logger.warn(`⏳ ${pending} pending episodes above high-water mark ${config.highWaterMark}`);
            }
            throttled = overHighWaterMark;

            if (wanted > 0 && pending > 0) {
                const episodes = await this.withRetry('drain experience', () => channels.experience.drain(wanted));
                const { dropped } = assembler.offer(episodes, currentVersion);

                this.staleDropped += dropped;
                if (dropped > 0) {
                    logger.info(`🗑️  Dropped ${dropped} stale episodes`);
                }
            }

            if (assembler.isFull()) {
                return this.readyBatch(assembler, startedAt, pending);
            }

            if (this.now() - windowStart >= config.maxBatchWaitMs) {
                if (assembler.size() > 0) {
                    return this.readyBatch(assembler, startedAt, pending);
                }
                if (await this.allWorkersFailed()) {
                    return { kind: 'stopped', outcome: { state: JobState.Failed, reason: 'every rollout worker failed' } };
                }
                windowStart = this.now();
            }

            await sleep(config.pollIntervalMs);
        }
    }

    protected readyBatch(assembler: BatchAssembler, startedAt: number, pending: number): Collected {
        const stats: BatchStats = {
            staleDropped: assembler.getStaleDropped(),
            versionLag: assembler.getMeanVersionLag(),
            waitTime: this.now() - startedAt,
            pending,
        };

        return { kind: 'batch', batch: assembler.take(this.iteration + 1), stats };
    }

    protected async runIteration(policy: PolicyVersion, batch: TrainingBatch, stats: BatchStats): Promise<PolicyVersion> {
        const startedAt = this.now();
        const weights = await this.options.updater.update(policy, batch);
        const next: PolicyVersion = {
            version: policy.version + 1,
            weights,
            createdAt: this.now(),
        };

        await this.withRetry('publish policy', () => this.options.channels.policies.publish(next));

        this.policy = next;
        this.iteration = batch.iteration;
        this.convergence.add(batch.meanReward, batch.episodes.length);

        const trainTime = this.now() - startedAt;

        logger.info(
            `✅ Iteration ${batch.iteration}: ${batch.episodes.length} episodes, `
            + `mean reward ${batch.meanReward.toFixed(3)}, published v${next.version} (${trainTime} ms)`,
        );

        await this.recordIterationMetrics(batch, next, stats, trainTime);

        return next;
    }

    protected async recordIterationMetrics(batch: TrainingBatch, policy: PolicyVersion, stats: BatchStats, trainTime: number) {
        try {
            await this.options.channels.metrics.record({
                source: 'train',
                kind: 'iteration',
                index: batch.iteration,
                origin: 'trainer',
                timestamp: this.now(),
                values: {
                    policy_version: policy.version,
                    batch_size: batch.episodes.length,
                    steps: batch.stepCount,
                    mean_reward: batch.meanReward,
                    stale_dropped: stats.staleDropped,
                    version_lag: stats.versionLag,
                    wait_time: stats.waitTime,
                    train_time: trainTime,
                    pending_experience: stats.pending,
                },
            });
        } catch (error) {
            logger.warn('⚠️  Iteration metrics not recorded:', describeError(error));
        }
    }

    protected async complete({ state, reason }: Outcome): Promise<JobState> {
        const { channels, controller } = this.options;

        this.setState(state);
        logger.info(`🏁 Job ${state}: ${reason}`);

        try {
            await this.withRetry('send stop notice', () => channels.stop.requestStop({
                reason: `job ${state}: ${reason}`,
                requestedAt: this.now(),
            }));
        } catch (error) {
            logger.error('❌ Workers were not notified to stop:', describeError(error));
        }

        try {
            const metrics = exportMetrics(await channels.metrics.snapshot());
            await controller.reportCompletion({
                state,
                reason,
                iterations: this.iteration,
                policyVersion: this.policy?.version ?? 0,
                metrics,
            });
        } catch (error) {
            logger.error('❌ Completion report failed:', describeError(error));
        }

        return state;
    }

    protected async isCancelRequested(): Promise<boolean> {
        if (!this.cancelRequested) {
            this.cancelRequested = await this.withRetry(
                'read cancel request',
                () => this.options.controller.isCancelRequested(),
            );
        }

        return this.cancelRequested;
    }

    protected async allWorkersFailed(): Promise<boolean> {
        const statuses = await this.withRetry('read worker statuses', () => this.options.channels.statuses.statuses());

        return statuses.length >= this.options.config.workerCount
            && statuses.every((status) => status.state === WorkerState.Failed);
    }

    protected async withRetry<T>(label: string, action: () => T | Promise<T>): Promise<T> {
        try {
            return await retryWithBackoff(action, {
                ...this.options.config.retry,
                isRetryable: (error) => isRetryable(error) && !(error instanceof NotReadyError),
                onRetry: (error, attempt, delay) => {
                    logger.warn(`🔁 ${label} failed (attempt ${attempt}), retrying in ${delay} ms:`, describeError(error));
                },
            });
        } catch (error) {
            if (error instanceof RetryExhaustedError) {
                throw new TrainerUnreachableError(error);
            }
            throw error;
        }
    }

    protected setState(state: JobState) {
        if (this.state$.getValue() !== state) {
            this.state$.next(state);
        }
    }
}
