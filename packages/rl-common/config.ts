import 'dotenv/config';
import { z } from 'zod';
import { ConfigInvalidError } from './errors.ts';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const retrySchema = z.object({
    retries: nonNegativeInt,
    initialDelayMs: nonNegativeInt,
    maxDelayMs: nonNegativeInt,
    factor: z.coerce.number().min(1).default(2),
});

const configSchema = z.object({
    // Batch assembly
    minBatchSize: positiveInt,
    maxBatchSize: positiveInt.optional(),           // defaults to minBatchSize
    maxBatchWaitMs: positiveInt,
    staleVersionLag: nonNegativeInt,                // accepted iff currentVersion - episodeVersion <= lag
    pollIntervalMs: positiveInt.default(50),
    // Convergence
    rewardThreshold: z.coerce.number().finite().optional(),
    convergenceWindow: positiveInt.optional(),
    maxIterations: positiveInt.optional(),
    maxEpisodes: positiveInt.optional(),
    // Rollout
    maxStepsPerEpisode: positiveInt,
    episodeTimeoutMs: positiveInt,
    policyStalenessMs: nonNegativeInt.default(0),
    evalEvery: nonNegativeInt.default(0),           // 0 disables evaluation episodes
    workerCount: positiveInt.default(1),
    // Channels
    experienceBufferSize: positiveInt,
    highWaterMark: positiveInt,
    policyRetention: positiveInt.default(5),
    retry: retrySchema,
}).superRefine((config, ctx) => {
    if ((config.rewardThreshold === undefined) !== (config.convergenceWindow === undefined)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['convergenceWindow'],
            message: 'rewardThreshold and convergenceWindow must be set together',
        });
    }
    if (config.highWaterMark > config.experienceBufferSize) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['highWaterMark'],
            message: 'must not exceed experienceBufferSize',
        });
    }
    if (config.maxBatchSize !== undefined && config.maxBatchSize < config.minBatchSize) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['maxBatchSize'],
            message: 'must not be lower than minBatchSize',
        });
    }
    if (config.retry.maxDelayMs < config.retry.initialDelayMs) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['retry', 'maxDelayMs'],
            message: 'must not be lower than retry.initialDelayMs',
        });
    }
}).transform((config) => ({
    ...config,
    maxBatchSize: config.maxBatchSize ?? config.minBatchSize,
}));

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.output<typeof configSchema>;
export type RetryConfig = Config['retry'];

export function parseConfig(input: unknown): Config {
    const result = configSchema.safeParse(input);

    if (!result.success) {
        throw new ConfigInvalidError(
            result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
        );
    }

    return result.data;
}

const ENV_KEYS = {
    minBatchSize: 'RL_MIN_BATCH_SIZE',
    maxBatchSize: 'RL_MAX_BATCH_SIZE',
    maxBatchWaitMs: 'RL_MAX_BATCH_WAIT_MS',
    staleVersionLag: 'RL_STALE_VERSION_LAG',
    pollIntervalMs: 'RL_POLL_INTERVAL_MS',
    rewardThreshold: 'RL_REWARD_THRESHOLD',
    convergenceWindow: 'RL_CONVERGENCE_WINDOW',
    maxIterations: 'RL_MAX_ITERATIONS',
    maxEpisodes: 'RL_MAX_EPISODES',
    maxStepsPerEpisode: 'RL_MAX_STEPS_PER_EPISODE',
    episodeTimeoutMs: 'RL_EPISODE_TIMEOUT_MS',
    policyStalenessMs: 'RL_POLICY_STALENESS_MS',
    evalEvery: 'RL_EVAL_EVERY',
    workerCount: 'RL_WORKER_COUNT',
    experienceBufferSize: 'RL_EXPERIENCE_BUFFER_SIZE',
    highWaterMark: 'RL_HIGH_WATER_MARK',
    policyRetention: 'RL_POLICY_RETENTION',
} as const;

const RETRY_ENV_KEYS = {
    retries: 'RL_RETRY_BUDGET',
    initialDelayMs: 'RL_RETRY_INITIAL_DELAY_MS',
    maxDelayMs: 'RL_RETRY_MAX_DELAY_MS',
    factor: 'RL_RETRY_FACTOR',
} as const;

function pickEnv(keys: Readonly<Record<string, string>>, env: NodeJS.ProcessEnv): Record<string, string> {
    const picked: Record<string, string> = {};

    for (const [field, name] of Object.entries(keys)) {
        const value = env[name]?.trim();
        if (value !== undefined && value !== '') {
            picked[field] = value;
        }
    }

    return picked;
}

/**
 * Reads the `RL_*` variables (a `.env` file is loaded first) and validates them.
 * Throws {@link ConfigInvalidError} before anything starts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return parseConfig({
        ...pickEnv(ENV_KEYS, env),
        retry: pickEnv(RETRY_ENV_KEYS, env),
    });
}
