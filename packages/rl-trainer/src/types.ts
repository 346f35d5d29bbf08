import { PolicyVersion, TrainingBatch } from '../../rl-common/types.ts';

/**
 * The optimizer side of training. Weights are opaque to the coordinator:
 * it only versions and distributes what `update` returns.
 */
export interface PolicyUpdater {
    initialWeights(): Uint8Array | Promise<Uint8Array>;
    update(policy: PolicyVersion, batch: TrainingBatch): Uint8Array | Promise<Uint8Array>;
}
