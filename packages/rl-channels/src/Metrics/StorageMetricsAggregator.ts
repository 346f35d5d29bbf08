import { randomUUID } from 'node:crypto';
import { createExclusive } from '../../../../lib/exclusive.ts';
import { MetricsAggregator } from '../../../rl-common/Metrics/MetricsAggregator.ts';
import { ObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { decodeMetricRecord, encodeMetricRecord } from '../../../rl-common/Storage/serialize.ts';
import { MetricRecord } from '../../../rl-common/types.ts';

const FOLDER = 'metrics';

/**
 * One object per record. Records seen by an earlier snapshot keep their position;
 * newly listed ones are appended in name order (timestamp, origin, per-writer sequence).
 * Overlapping snapshots run one after another.
 */
export class StorageMetricsAggregator implements MetricsAggregator {
    private readonly writerId = randomUUID().slice(0, 8);
    private sequence = 0;
    private seen = new Set<string>();
    private ordered: MetricRecord[] = [];
    private exclusive = createExclusive();

    constructor(private readonly storage: ObjectStorage) {
    }

    async record(entry: MetricRecord): Promise<void> {
        const name = [
            String(entry.timestamp).padStart(15, '0'),
            encodeURIComponent(entry.origin),
            this.writerId,
            String(this.sequence++).padStart(9, '0'),
        ].join('_') + '.json';

        await this.storage.upload(FOLDER, name, encodeMetricRecord(entry));
    }

    snapshot(): Promise<readonly MetricRecord[]> {
        return this.exclusive(() => this.collect());
    }

    private async collect(): Promise<readonly MetricRecord[]> {
        const fresh = (await this.storage.list(FOLDER)).filter((name) => !this.seen.has(name));
        const texts = await Promise.all(fresh.map((name) => this.storage.download(FOLDER, name)));

        fresh.forEach((name, i) => {
            const text = texts[i];
            if (text === undefined) return;

            this.seen.add(name);
            this.ordered.push(Object.freeze(decodeMetricRecord(text)));
        });

        return Object.freeze(this.ordered.slice());
    }
}
