import { BoundedSet } from '../../../../lib/BoundedSet.ts';
import { isSealedEpisode } from '../../../rl-common/Episode/EpisodeMemory.ts';
import { OverflowError, UnsealedEpisodeError } from '../../../rl-common/errors.ts';
import { Episode } from '../../../rl-common/types.ts';
import { ExperienceChannel } from './ExperienceChannel.ts';

// Ids of the latest accepted episodes, twice the buffer so every pending one is covered.
export function getDedupCapacity(maxBufferSize: number): number {
    return Math.max(1, maxBufferSize) * 2;
}

export class MemoryExperienceChannel implements ExperienceChannel {
    private queue: Episode[] = [];
    private accepted: BoundedSet<string>;

    constructor(private readonly maxBufferSize: number) {
        this.accepted = new BoundedSet(getDedupCapacity(maxBufferSize));
    }

    get rememberedIds(): number {
        return this.accepted.size;
    }

    async publish(episode: Episode): Promise<void> {
        if (!isSealedEpisode(episode)) {
            throw new UnsealedEpisodeError(episode.id);
        }
        // a retried publish of an accepted episode
        if (this.accepted.has(episode.id)) return;

        if (this.queue.length >= this.maxBufferSize) {
            throw new OverflowError(this.maxBufferSize);
        }

        this.accepted.add(episode.id);
        this.queue.push(episode);
    }

    async drain(maxItems: number): Promise<Episode[]> {
        return this.queue.splice(0, Math.max(0, Math.floor(maxItems)));
    }

    async pending(): Promise<number> {
        return this.queue.length;
    }
}
