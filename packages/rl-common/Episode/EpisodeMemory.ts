import { randomUUID } from 'node:crypto';
import { clamp } from 'lodash-es';
import { Episode, Step, TerminalReason } from '../types.ts';

export type EpisodeHeader = {
    workerId: string,
    sequence: number,
    policyVersion: number,
    trial: number,
    startedAt: number,
    isEvaluation: boolean,
}

/**
 * Collects the steps of one running episode. Nothing leaves the worker until
 * {@link EpisodeMemory.seal} turns the memory into an immutable {@link Episode}.
 */
export class EpisodeMemory {
    public readonly id = randomUUID();

    private steps: Step[] = [];
    private totalReward = 0;
    private progress = 0;
    private sealed = false;

    constructor(public readonly header: EpisodeHeader) {
    }

    size() {
        return this.steps.length;
    }

    isDone() {
        return this.steps.length > 0 && this.steps[this.steps.length - 1].done;
    }

    isSealed() {
        return this.sealed;
    }

    addStep(step: Step, progress?: number) {
        if (this.sealed) {
            throw new Error(`Episode ${this.id} is sealed`);
        }
        if (this.isDone()) return;

        this.steps.push({
            observation: step.observation.slice(),
            action: step.action.slice(),
            reward: step.reward,
            done: step.done,
        });
        this.totalReward += step.reward;

        if (progress !== undefined) {
            this.progress = clamp(progress, 0, 100);
        }
    }

    seal(terminalReason: TerminalReason, sealedAt: number): Episode {
        if (this.sealed) {
            throw new Error(`Episode ${this.id} is already sealed`);
        }

        this.sealed = true;

        return freezeEpisode({
            id: this.id,
            ...this.header,
            steps: this.steps,
            totalReward: this.totalReward,
            stepCount: this.steps.length,
            terminalReason,
            progress: this.progress,
            sealedAt,
            elapsedMs: Math.max(0, sealedAt - this.header.startedAt),
        });
    }
}

export function freezeEpisode(episode: Episode): Episode {
    for (const step of episode.steps) {
        Object.freeze(step.observation);
        Object.freeze(step.action);
        Object.freeze(step);
    }
    Object.freeze(episode.steps);

    return Object.freeze(episode);
}

export function isSealedEpisode(episode: Episode): boolean {
    return Object.isFrozen(episode)
        && Object.isFrozen(episode.steps)
        && Object.values(TerminalReason).includes(episode.terminalReason);
}
