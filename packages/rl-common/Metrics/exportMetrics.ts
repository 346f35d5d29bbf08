import { MetricRecord } from '../types.ts';

export type EpisodeMetricExport = {
    episode: number,
    reward_score: number,
    trial: number,
    completion_percentage: number,
    elapsed_time: number,
    phase: 'training' | 'evaluation',
    worker: string,
    timestamp: number,
}

export type IterationMetricExport = {
    iteration: number,
    timestamp: number,
    [key: string]: number,
}

export type MetricExport = EpisodeMetricExport | IterationMetricExport;

/**
 * Flattens records into the list consumed by plotting tools. Episode rows carry
 * `episode`, `reward_score`, `trial`, `completion_percentage` and `elapsed_time` (ms).
 */
export function exportMetrics(records: Iterable<MetricRecord>): MetricExport[] {
    const rows: MetricExport[] = [];

    for (const record of records) {
        if (record.kind === 'episode') {
            rows.push({
                episode: record.index,
                reward_score: record.values.reward_score ?? 0,
                trial: record.values.trial ?? 0,
                completion_percentage: record.values.completion_percentage ?? 0,
                elapsed_time: record.values.elapsed_time ?? 0,
                phase: record.source === 'eval' ? 'evaluation' : 'training',
                worker: record.origin,
                timestamp: record.timestamp,
            });
        } else {
            rows.push({
                ...record.values,
                iteration: record.index,
                timestamp: record.timestamp,
            });
        }
    }

    return rows;
}

export function isEpisodeExport(row: MetricExport): row is EpisodeMetricExport {
    return 'episode' in row && 'worker' in row;
}
