import { PolicyChannel, PolicyReader } from '../../../rl-channels/src/Policy/PolicyChannel.ts';
import { PolicyVersion } from '../../../rl-common/types.ts';

/**
 * Worker-side copy of the policy. A cached version younger than `stalenessMs`
 * is reused without asking the channel; with `stalenessMs = 0` every episode refetches.
 */
export class PolicyCache {
    private reader: PolicyReader;
    private fetchedAt = -Infinity;

    constructor(
        channel: PolicyChannel,
        private readonly stalenessMs: number,
        private readonly now: () => number = Date.now,
    ) {
        this.reader = new PolicyReader(channel);
    }

    current(): undefined | PolicyVersion {
        return this.reader.current();
    }

    isFresh(): boolean {
        return this.reader.current() !== undefined && this.now() - this.fetchedAt < this.stalenessMs;
    }

    async get(): Promise<{ policy: PolicyVersion, changed: boolean }> {
        const previous = this.reader.current();

        if (previous !== undefined && this.isFresh()) {
            return { policy: previous, changed: false };
        }

        const policy = await this.reader.fetchLatest();
        this.fetchedAt = this.now();

        return { policy, changed: policy.version !== previous?.version };
    }
}
