import { min } from 'lodash-es';
import { RingBuffer } from 'ring-buffer-ts';

export type ConvergenceCriteria = {
    rewardThreshold?: number,
    convergenceWindow?: number,
    maxIterations?: number,
    maxEpisodes?: number,
}

/**
 * Tracks batch rewards over a trailing window of iterations. The reward criterion
 * holds once every iteration of a full window reached the threshold.
 * With no criterion configured `check` never reports convergence and the job runs until cancelled.
 */
export class ConvergenceTracker {
    private rewards: undefined | RingBuffer<number>;
    private iterations = 0;
    private episodes = 0;

    constructor(private readonly criteria: ConvergenceCriteria) {
        if (criteria.rewardThreshold !== undefined && criteria.convergenceWindow !== undefined) {
            this.rewards = new RingBuffer<number>(criteria.convergenceWindow);
        }
    }

    add(meanReward: number, episodeCount: number) {
        this.iterations++;
        this.episodes += episodeCount;
        this.rewards?.add(meanReward);
    }

    // lowest batch reward of a full window
    windowMinimum(): undefined | number {
        if (this.rewards === undefined || this.rewards.getBufferLength() < this.rewards.getSize()) {
            return undefined;
        }

        return min(this.rewards.toArray());
    }

    // reason of convergence, if reached
    check(): undefined | string {
        const { rewardThreshold, convergenceWindow, maxIterations, maxEpisodes } = this.criteria;
        const lowest = this.windowMinimum();

        if (lowest !== undefined && rewardThreshold !== undefined && lowest >= rewardThreshold) {
            return `reward >= ${rewardThreshold} in each of the last ${convergenceWindow} iterations`;
        }
        if (maxIterations !== undefined && this.iterations >= maxIterations) {
            return `reached ${this.iterations} iterations`;
        }
        if (maxEpisodes !== undefined && this.episodes >= maxEpisodes) {
            return `reached ${this.episodes} episodes`;
        }

        return undefined;
    }
}
