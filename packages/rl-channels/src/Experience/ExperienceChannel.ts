import { Episode } from '../../../rl-common/types.ts';

/**
 * Rollout workers publish sealed episodes, the trainer drains them.
 * Each published episode is delivered to at most one `drain` call, in arrival order.
 */
export interface ExperienceChannel {
    // throws OverflowError when the buffer is full, UnsealedEpisodeError for partial episodes
    publish(episode: Episode): Promise<void>;
    // never blocks; returns at most `maxItems` episodes, possibly none
    drain(maxItems: number): Promise<Episode[]>;
    pending(): Promise<number>;
}
