import { MetricRecord } from '../types.ts';

export interface MetricsAggregator {
    record(entry: MetricRecord): Promise<void>;
    // finite, restartable copy; later snapshots only ever extend earlier ones
    snapshot(): Promise<readonly MetricRecord[]>;
}

export class MemoryMetricsAggregator implements MetricsAggregator {
    private entries: MetricRecord[] = [];

    async record(entry: MetricRecord): Promise<void> {
        this.entries.push(Object.freeze({ ...entry, values: Object.freeze({ ...entry.values }) }));
    }

    async snapshot(): Promise<readonly MetricRecord[]> {
        return Object.freeze(this.entries.slice());
    }

    size() {
        return this.entries.length;
    }
}
