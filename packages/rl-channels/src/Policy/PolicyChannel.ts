import { PolicyVersion } from '../../../rl-common/types.ts';

/**
 * Broadcast of trainer policies to rollout workers.
 * `publish` is idempotent per version; `fetchLatest` throws NotReadyError until
 * a version exists (or an initial version was configured).
 */
export interface PolicyChannel {
    publish(policy: PolicyVersion): Promise<void>;
    fetchLatest(): Promise<PolicyVersion>;
    // only versions still held in the recent buffer
    fetchVersion(version: number): Promise<undefined | PolicyVersion>;
}

// Frozen copy with its own weights: `Object.freeze` leaves typed array contents writable.
export function copyPolicy(policy: PolicyVersion): PolicyVersion {
    return Object.freeze({
        version: policy.version,
        weights: policy.weights.slice(),
        createdAt: policy.createdAt,
    });
}

/**
 * Per-caller view with monotonic freshness: once a version was returned,
 * nothing older is returned again, even if the channel lags behind.
 */
export class PolicyReader {
    private last: undefined | PolicyVersion;

    constructor(private readonly channel: PolicyChannel) {
    }

    async fetchLatest(): Promise<PolicyVersion> {
        const fetched = await this.channel.fetchLatest();

        if (this.last !== undefined && fetched.version < this.last.version) {
            return this.last;
        }

        this.last = fetched;
        return fetched;
    }

    current(): undefined | PolicyVersion {
        return this.last;
    }
}
