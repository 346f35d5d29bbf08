import { mean, sumBy, uniq } from 'lodash-es';
import { Episode, TrainingBatch } from '../../../rl-common/types.ts';

/**
 * Accumulates drained episodes for one iteration. Episodes generated more than
 * `staleVersionLag` versions behind the trainer are dropped and counted.
 */
export class BatchAssembler {
    private episodes: Episode[] = [];
    private staleDropped = 0;
    private versionLags: number[] = [];

    constructor(
        private readonly minBatchSize: number,
        private readonly staleVersionLag: number,
    ) {
    }

    size() {
        return this.episodes.length;
    }

    isFull() {
        return this.episodes.length >= this.minBatchSize;
    }

    getStaleDropped() {
        return this.staleDropped;
    }

    getMeanVersionLag() {
        return this.versionLags.length > 0 ? mean(this.versionLags) : 0;
    }

    offer(episodes: readonly Episode[], currentVersion: number): { accepted: number, dropped: number } {
        let accepted = 0;
        let dropped = 0;

        for (const episode of episodes) {
            const lag = currentVersion - episode.policyVersion;

            if (lag > this.staleVersionLag) {
                dropped++;
                continue;
            }

            this.episodes.push(episode);
            this.versionLags.push(lag);
            accepted++;
        }

        this.staleDropped += dropped;

        return { accepted, dropped };
    }

    take(iteration: number): TrainingBatch {
        const episodes = this.episodes;

        this.episodes = [];
        this.versionLags = [];

        return Object.freeze({
            iteration,
            episodes: Object.freeze(episodes),
            versions: Object.freeze(uniq(episodes.map((episode) => episode.policyVersion)).sort((a, b) => a - b)),
            stepCount: sumBy(episodes, (episode) => episode.stepCount),
            meanReward: episodes.length > 0 ? mean(episodes.map((episode) => episode.totalReward)) : 0,
        });
    }

    discard(): number {
        const count = this.episodes.length;

        this.episodes = [];
        this.versionLags = [];

        return count;
    }
}
