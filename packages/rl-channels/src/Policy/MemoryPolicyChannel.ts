import { isEqual } from 'lodash-es';
import { RingBuffer } from 'ring-buffer-ts';
import { BehaviorSubject, distinctUntilChanged, filter, map, Observable } from 'rxjs';
import { NotReadyError, PolicyConflictError } from '../../../rl-common/errors.ts';
import { PolicyVersion } from '../../../rl-common/types.ts';
import { copyPolicy, PolicyChannel } from './PolicyChannel.ts';

// Callers get their own copy of the weights, so nothing they do reaches the published version.
export class MemoryPolicyChannel implements PolicyChannel {
    private latest$: BehaviorSubject<undefined | PolicyVersion>;
    private recent: RingBuffer<PolicyVersion>;

    // emits once per newly published version
    public readonly version$: Observable<PolicyVersion>;

    constructor({ retention, initial }: { retention: number, initial?: PolicyVersion }) {
        const first = initial && copyPolicy(initial);

        this.recent = new RingBuffer<PolicyVersion>(retention);
        this.latest$ = new BehaviorSubject<undefined | PolicyVersion>(first);
        first && this.recent.add(first);

        this.version$ = this.latest$.pipe(
            filter((policy): policy is PolicyVersion => policy !== undefined),
            distinctUntilChanged((a, b) => a.version === b.version),
            map(copyPolicy),
        );
    }

    async publish(policy: PolicyVersion): Promise<void> {
        const latest = this.latest$.getValue();

        if (latest !== undefined && policy.version <= latest.version) {
            const known = policy.version === latest.version ? latest : this.findRecent(policy.version);

            if (known !== undefined && !isEqual(known.weights, policy.weights)) {
                throw new PolicyConflictError(policy.version);
            }
            return;
        }

        const copy = copyPolicy(policy);
        this.recent.add(copy);
        this.latest$.next(copy);
    }

    async fetchLatest(): Promise<PolicyVersion> {
        const latest = this.latest$.getValue();

        if (latest === undefined) {
            throw new NotReadyError();
        }

        return copyPolicy(latest);
    }

    async fetchVersion(version: number): Promise<undefined | PolicyVersion> {
        const policy = this.findRecent(version);
        return policy && copyPolicy(policy);
    }

    private findRecent(version: number) {
        return this.recent.toArray().find((policy) => policy.version === version);
    }
}
