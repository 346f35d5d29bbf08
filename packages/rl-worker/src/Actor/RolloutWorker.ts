import { BehaviorSubject, firstValueFrom, from, throwError, timeout } from 'rxjs';
import { createConsole, PrefixedConsole } from '../../../../lib/console.ts';
import { retryWithBackoff, RetryExhaustedError, sleep } from '../../../../lib/retry.ts';
import { ChannelSet } from '../../../rl-channels/src/createChannels.ts';
import { Config } from '../../../rl-common/config.ts';
import { EpisodeMemory } from '../../../rl-common/Episode/EpisodeMemory.ts';
import {
    describeError,
    isRetryable,
    NotReadyError,
    OverflowError,
    SimulatorTimeoutError,
    WorkerUnreachableError,
} from '../../../rl-common/errors.ts';
import { Episode, PolicyVersion, TerminalReason, WorkerState } from '../../../rl-common/types.ts';
import { Agent, AgentFactory, Simulator, StepResult } from '../types.ts';
import { PolicyCache } from './PolicyCache.ts';

export type RolloutWorkerOptions = {
    workerId: string,
    config: Config,
    channels: ChannelSet,
    simulator: Simulator,
    createAgent: AgentFactory,
    now?: () => number,
}

type EpisodePlan = {
    policy: PolicyVersion,
    agent: Agent,
    isEvaluation: boolean,
}

/**
 * Idle → FetchingPolicy → RunningEpisode → Reporting → Idle, until the stop signal
 * (checked on episode boundaries) or an exhausted retry budget ends the loop.
 */
export class RolloutWorker {
    public readonly state$ = new BehaviorSubject<WorkerState>(WorkerState.Idle);

    protected readonly logger: PrefixedConsole;
    protected readonly now: () => number;
    protected readonly policyCache: PolicyCache;

    protected agent: undefined | Agent;
    protected localStop: undefined | string;
    protected episodes = 0;
    protected sequence = 0;
    protected trial = 0;

    constructor(protected readonly options: RolloutWorkerOptions) {
        this.now = options.now ?? Date.now;
        this.logger = createConsole(`[WORKER|${options.workerId}]`);
        this.policyCache = new PolicyCache(options.channels.policies, options.config.policyStalenessMs, this.now);
    }

    public get workerId() {
        return this.options.workerId;
    }

    public getState(): WorkerState {
        return this.state$.getValue();
    }

    public getEpisodeCount(): number {
        return this.episodes;
    }

    // Takes effect on the next episode boundary.
    public stop(reason: string = 'stopped locally') {
        this.localStop = reason;
    }

    public async start(): Promise<WorkerState> {
        this.logger.info('🚗 Rollout worker started');

        try {
            await this.reportStatus();

            while (true) {
                if (await this.isStopRequested()) {
                    return await this.finish(WorkerState.Stopped);
                }

                await this.runEpisode();
                // let timers of other actors in this process run between episodes
                await sleep(0);
            }
        } catch (error) {
            this.logger.error('❌ Rollout worker failed:', describeError(error));
            return await this.finish(WorkerState.Failed, describeError(error));
        }
    }

    protected async runEpisode() {
        this.setState(WorkerState.FetchingPolicy);
        const plan = await this.beforeEpisode();

        if (plan === undefined) return;

        this.setState(WorkerState.RunningEpisode);
        const episode = await this.rollout(plan);

        this.setState(WorkerState.Reporting);
        await this.afterEpisode(episode);

        this.setState(WorkerState.Idle);
    }

    protected async beforeEpisode(): Promise<undefined | EpisodePlan> {
        const fetched = await this.fetchPolicy();

        if (fetched === undefined) return undefined;

        if (fetched.changed || this.agent === undefined) {
            this.agent = await this.options.createAgent(fetched.policy);
            this.trial = 0;
            this.logger.info(`📥 Using policy v${fetched.policy.version}`);
        }

        const evalEvery = this.options.config.evalEvery;

        return {
            policy: fetched.policy,
            agent: this.agent,
            isEvaluation: evalEvery > 0 && (this.episodes + 1) % evalEvery === 0,
        };
    }

    protected async afterEpisode(episode: Episode) {
        // evaluation runs only feed the metrics
        if (!episode.isEvaluation) {
            await this.publishEpisode(episode);
        }

        this.episodes++;
        await this.recordEpisodeMetrics(episode);
        await this.reportStatus();
    }

    protected async rollout({ policy, agent, isEvaluation }: EpisodePlan): Promise<Episode> {
        const { maxStepsPerEpisode, episodeTimeoutMs } = this.options.config;
        const { simulator } = this.options;
        const startedAt = this.now();
        const memory = new EpisodeMemory({
            workerId: this.workerId,
            sequence: this.sequence++,
            policyVersion: policy.version,
            trial: ++this.trial,
            startedAt,
            isEvaluation,
        });

        // a hung reset is retried like any other reset failure
        let observation = await this.withRetry(
            'reset simulator',
            () => withTimeout(() => simulator.reset(), episodeTimeoutMs, 'Simulator reset'),
            { anyError: true, retryTimeout: true },
        );
        // running out of steps or time ends the episode as a timeout
        let reason = TerminalReason.Timeout;

        for (let i = 0; i < maxStepsPerEpisode; i++) {
            const remaining = episodeTimeoutMs - (this.now() - startedAt);
            if (remaining <= 0) break;

            let result: StepResult;
            let action: number[];
            try {
                action = await withTimeout(() => agent.act(observation), remaining, 'Agent');
                result = await this.withRetry(
                    'simulator step',
                    () => withTimeout(() => simulator.step(action), remaining),
                    { anyError: true },
                );
            } catch (error) {
                if (error instanceof SimulatorTimeoutError) {
                    this.logger.warn(`⏱️  ${error.message}, episode force-terminated`);
                    break;
                }
                throw error;
            }

            memory.addStep({ observation, action, reward: result.reward, done: result.done }, result.progress);
            observation = result.observation;

            if (result.done) {
                reason = result.offTrack ? TerminalReason.OffTrack : TerminalReason.Completed;
                break;
            }
        }

        return memory.seal(reason, this.now());
    }

    // A full buffer is waited out without spending the retry budget.
    protected async publishEpisode(episode: Episode) {
        const { experience } = this.options.channels;

        while (true) {
            try {
                return await this.withRetry('publish episode', () => experience.publish(episode));
            } catch (error) {
                if (!(error instanceof OverflowError)) throw error;
                if (await this.isStopRequested()) {
                    this.logger.info(`🗑️  Episode ${episode.id} not published: buffer full while stopping`);
                    return;
                }

                await sleep(this.options.config.pollIntervalMs);
            }
        }
    }

    // NotReady is waited out without spending the retry budget.
    protected async fetchPolicy() {
        while (true) {
            try {
                return await this.withRetry('fetch policy', () => this.policyCache.get());
            } catch (error) {
                if (!(error instanceof NotReadyError)) throw error;
                if (await this.isStopRequested()) return undefined;

                await sleep(this.options.config.pollIntervalMs);
            }
        }
    }

    protected async recordEpisodeMetrics(episode: Episode) {
        try {
            await this.options.channels.metrics.record({
                source: episode.isEvaluation ? 'eval' : 'train',
                kind: 'episode',
                index: this.episodes,
                origin: this.workerId,
                timestamp: this.now(),
                values: {
                    reward_score: episode.totalReward,
                    trial: episode.trial,
                    completion_percentage: episode.progress,
                    elapsed_time: episode.elapsedMs,
                    steps: episode.stepCount,
                    policy_version: episode.policyVersion,
                    off_track: episode.terminalReason === TerminalReason.OffTrack ? 1 : 0,
                },
            });
        } catch (error) {
            this.logger.warn('⚠️  Episode metrics not recorded:', describeError(error));
        }
    }

    protected async isStopRequested(): Promise<boolean> {
        if (this.localStop !== undefined) {
            this.logger.info(`🛑 ${this.localStop}`);
            return true;
        }

        const notice = await this.withRetry('read stop signal', () => this.options.channels.stop.read());

        if (notice !== undefined) {
            this.logger.info(`🛑 Stop requested: ${notice.reason}`);
        }

        return notice !== undefined;
    }

    protected async finish(state: WorkerState.Stopped | WorkerState.Failed, error?: string): Promise<WorkerState> {
        this.setState(state);

        try {
            await this.reportStatus(error);
        } catch (reportError) {
            this.logger.error(`❌ Could not report ${state} status:`, describeError(reportError));
        }

        return state;
    }

    protected reportStatus(error?: string) {
        return this.withRetry('report status', () => this.options.channels.statuses.report({
            workerId: this.workerId,
            state: this.getState(),
            timestamp: this.now(),
            episodes: this.episodes,
            ...(error !== undefined ? { error } : {}),
        }));
    }

    // Channel calls retry on retryable coordination errors, simulator calls on any error.
    // A timed out step is not retried unless `retryTimeout` is set.
    protected async withRetry<T>(
        label: string,
        action: () => T | Promise<T>,
        { anyError = false, retryTimeout = false }: { anyError?: boolean, retryTimeout?: boolean } = {},
    ): Promise<T> {
        try {
            return await retryWithBackoff(action, {
                ...this.options.config.retry,
                isRetryable: (error) => error instanceof SimulatorTimeoutError
                    ? retryTimeout
                    : !isWaitedOut(error) && (anyError || isRetryable(error)),
                onRetry: (error, attempt, delay) => {
                    this.logger.warn(`🔁 ${label} failed (attempt ${attempt}), retrying in ${delay} ms:`, describeError(error));
                },
            });
        } catch (error) {
            if (error instanceof RetryExhaustedError) {
                throw new WorkerUnreachableError(this.workerId, error);
            }
            throw error;
        }
    }

    protected setState(state: WorkerState) {
        if (this.state$.getValue() !== state) {
            this.state$.next(state);
        }
    }
}

function isWaitedOut(error: unknown) {
    return error instanceof NotReadyError || error instanceof OverflowError;
}

function withTimeout<T>(call: () => T | Promise<T>, ms: number, name?: string): Promise<T> {
    return firstValueFrom(from(Promise.resolve().then(call)).pipe(
        timeout({ first: ms, with: () => throwError(() => new SimulatorTimeoutError(ms, name)) }),
    ));
}
