import { BoundedSet } from '../../../../lib/BoundedSet.ts';
import { createConsole } from '../../../../lib/console.ts';
import { createExclusive } from '../../../../lib/exclusive.ts';
import { isSealedEpisode } from '../../../rl-common/Episode/EpisodeMemory.ts';
import { OverflowError, UnsealedEpisodeError } from '../../../rl-common/errors.ts';
import { ObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { decodeEpisode, encodeEpisode } from '../../../rl-common/Storage/serialize.ts';
import { Episode } from '../../../rl-common/types.ts';
import { ExperienceChannel } from './ExperienceChannel.ts';
import { getDedupCapacity } from './MemoryExperienceChannel.ts';

const FOLDER = 'experience';
const logger = createConsole('[EXPERIENCE]');

// Names sort by seal time, then worker and its submission index.
export function getEpisodeObjectName(episode: Episode): string {
    return [
        String(episode.sealedAt).padStart(15, '0'),
        episode.workerId,
        String(episode.sequence).padStart(9, '0'),
        episode.id,
    ].join('_') + '.json';
}

/**
 * Experience buffered in object storage so workers and the trainer can run as separate processes.
 * Only one trainer drains a channel: it removes what it downloaded and remembers
 * recently delivered names, so a republished or undeleted object is never handed out twice.
 *
 * Publishes through one instance are checked against the capacity one at a time.
 * Separate processes publishing into the same folder can still overshoot it, so
 * across processes the cap is best-effort.
 */
export class StorageExperienceChannel implements ExperienceChannel {
    private delivered: BoundedSet<string>;
    private exclusive = createExclusive();

    constructor(
        private readonly storage: ObjectStorage,
        private readonly maxBufferSize: number,
    ) {
        this.delivered = new BoundedSet(getDedupCapacity(maxBufferSize));
    }

    get rememberedNames(): number {
        return this.delivered.size;
    }

    async publish(episode: Episode): Promise<void> {
        if (!isSealedEpisode(episode)) {
            throw new UnsealedEpisodeError(episode.id);
        }

        return this.exclusive(() => this.upload(episode));
    }

    async drain(maxItems: number): Promise<Episode[]> {
        return this.exclusive(() => this.take(maxItems));
    }

    async pending(): Promise<number> {
        const names = await this.storage.list(FOLDER);
        return names.filter((name) => !this.delivered.has(name)).length;
    }

    private async upload(episode: Episode): Promise<void> {
        const name = getEpisodeObjectName(episode);
        const names = await this.storage.list(FOLDER);

        if (names.includes(name)) return;
        if (names.length >= this.maxBufferSize) {
            throw new OverflowError(this.maxBufferSize);
        }

        await this.storage.upload(FOLDER, name, encodeEpisode(episode));
    }

    private async take(maxItems: number): Promise<Episode[]> {
        const all = await this.storage.list(FOLDER);
        // republished after delivery: removed, never returned
        const redelivered = all.filter((name) => this.delivered.has(name));
        const names = all
            .filter((name) => !this.delivered.has(name))
            .slice(0, Math.max(0, Math.floor(maxItems)));
        const episodes: Episode[] = [];

        for (const name of names) {
            const text = await this.storage.download(FOLDER, name);
            if (text === undefined) continue;

            try {
                episodes.push(decodeEpisode(text));
            } catch (error) {
                logger.warn(`⚠️  Dropping unreadable experience object ${name}:`, error);
            }
        }

        await this.storage.remove(FOLDER, [...names, ...redelivered]);
        names.forEach((name) => this.delivered.add(name));

        return episodes;
    }
}
