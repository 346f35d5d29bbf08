import { parse, stringify } from 'devalue';
import { z } from 'zod';
import { freezeEpisode } from '../Episode/EpisodeMemory.ts';
import {
    Episode,
    MetricRecord,
    PolicyVersion,
    TerminalReason,
    WorkerState,
    WorkerStatus,
} from '../types.ts';

const stepSchema = z.object({
    observation: z.array(z.number()),
    action: z.array(z.number()),
    reward: z.number(),
    done: z.boolean(),
});

const episodeSchema = z.object({
    id: z.string().min(1),
    workerId: z.string().min(1),
    sequence: z.number().int().nonnegative(),
    policyVersion: z.number().int().nonnegative(),
    steps: z.array(stepSchema),
    totalReward: z.number(),
    stepCount: z.number().int().nonnegative(),
    terminalReason: z.nativeEnum(TerminalReason),
    progress: z.number(),
    trial: z.number().int(),
    startedAt: z.number(),
    sealedAt: z.number(),
    elapsedMs: z.number(),
    isEvaluation: z.boolean(),
});

// weights travel as a base64 string inside the devalue text
const storedPolicySchema = z.object({
    version: z.number().int().nonnegative(),
    weights: z.string(),
    createdAt: z.number(),
});

const workerStatusSchema = z.object({
    workerId: z.string().min(1),
    state: z.nativeEnum(WorkerState),
    timestamp: z.number(),
    episodes: z.number().int().nonnegative(),
    error: z.string().optional(),
});

const metricRecordSchema = z.object({
    source: z.enum(['train', 'eval']),
    kind: z.enum(['episode', 'iteration']),
    index: z.number().int(),
    origin: z.string(),
    timestamp: z.number(),
    values: z.record(z.number()),
});

export function encodeEpisode(episode: Episode): string {
    return stringify(episode);
}

export function decodeEpisode(text: string): Episode {
    return freezeEpisode(episodeSchema.parse(parse(text)));
}

export function encodePolicy(policy: PolicyVersion): string {
    return stringify({
        version: policy.version,
        weights: Buffer.from(policy.weights).toString('base64'),
        createdAt: policy.createdAt,
    });
}

export function decodePolicy(text: string): PolicyVersion {
    const stored = storedPolicySchema.parse(parse(text));

    return Object.freeze({
        version: stored.version,
        weights: new Uint8Array(Buffer.from(stored.weights, 'base64')),
        createdAt: stored.createdAt,
    });
}

export function encodeWorkerStatus(status: WorkerStatus): string {
    return stringify(status);
}

export function decodeWorkerStatus(text: string): WorkerStatus {
    return workerStatusSchema.parse(parse(text));
}

export function encodeMetricRecord(record: MetricRecord): string {
    return stringify(record);
}

export function decodeMetricRecord(text: string): MetricRecord {
    return metricRecordSchema.parse(parse(text));
}

export function encodeJson(value: unknown): string {
    return stringify(value);
}

export function decodeJson(text: string): unknown {
    return parse(text);
}
