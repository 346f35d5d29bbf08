import { PolicyVersion } from '../../rl-common/types.ts';

export type StepResult = {
    observation: number[],
    reward: number,
    done: boolean,
    // completion percentage of the track, 0..100
    progress?: number,
    offTrack?: boolean,
}

// The track simulator. Every worker owns its own instance.
export interface Simulator {
    reset(): number[] | Promise<number[]>;
    step(action: number[]): StepResult | Promise<StepResult>;
}

export interface Agent {
    act(observation: number[]): number[] | Promise<number[]>;
}

// Builds the decision function from a policy's weights.
export type AgentFactory = (policy: PolicyVersion) => Agent | Promise<Agent>;
