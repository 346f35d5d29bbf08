import { describe, expect, it } from 'vitest';
import { MemoryObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { MetricRecord } from '../../../rl-common/types.ts';
import { StorageMetricsAggregator } from './StorageMetricsAggregator.ts';

function episodeRecord(origin: string, index: number, timestamp: number): MetricRecord {
    return {
        source: 'train',
        kind: 'episode',
        index,
        origin,
        timestamp,
        values: { reward_score: index },
    };
}

describe('StorageMetricsAggregator', () => {
    it('collects the records of every writer', async () => {
        const storage = new MemoryObjectStorage();
        const worker = new StorageMetricsAggregator(storage);
        const trainer = new StorageMetricsAggregator(storage);

        await worker.record(episodeRecord('worker-0', 1, 20));
        await worker.record(episodeRecord('worker-0', 2, 10));

        expect(await trainer.snapshot()).toEqual([
            episodeRecord('worker-0', 2, 10),
            episodeRecord('worker-0', 1, 20),
        ]);
    });

    it('only appends to what earlier snapshots returned', async () => {
        const storage = new MemoryObjectStorage();
        const metrics = new StorageMetricsAggregator(storage);

        await metrics.record(episodeRecord('worker-0', 1, 50));
        const first = await metrics.snapshot();

        // older timestamp, listed before the first record
        await metrics.record(episodeRecord('worker-1', 1, 40));
        const second = await metrics.snapshot();

        expect(first.map((entry) => entry.origin)).toEqual(['worker-0']);
        expect(second.map((entry) => entry.origin)).toEqual(['worker-0', 'worker-1']);
        expect(Object.isFrozen(second)).toBe(true);
    });

    it('does not repeat records across overlapping snapshots', async () => {
        const storage = new MemoryObjectStorage();
        const metrics = new StorageMetricsAggregator(storage);

        await metrics.record(episodeRecord('worker-0', 1, 10));
        await metrics.record(episodeRecord('worker-0', 2, 20));

        const [first, second] = await Promise.all([metrics.snapshot(), metrics.snapshot()]);

        expect(first.map((entry) => entry.index)).toEqual([1, 2]);
        expect(second.map((entry) => entry.index)).toEqual([1, 2]);
    });
});
