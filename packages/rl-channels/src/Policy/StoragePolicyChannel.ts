import { isEqual } from 'lodash-es';
import { createConsole } from '../../../../lib/console.ts';
import { NotReadyError, PolicyConflictError, TransientChannelError } from '../../../rl-common/errors.ts';
import { ObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { decodeJson, decodePolicy, encodeJson, encodePolicy } from '../../../rl-common/Storage/serialize.ts';
import { PolicyVersion } from '../../../rl-common/types.ts';
import { copyPolicy, PolicyChannel } from './PolicyChannel.ts';

const FOLDER = 'policies';
const LATEST = 'latest.json';
const logger = createConsole('[POLICY]');

export function getPolicyObjectName(version: number): string {
    return `v${String(version).padStart(9, '0')}.json`;
}

function readPointer(text: undefined | string): undefined | number {
    if (text === undefined) return undefined;

    const pointer = decodeJson(text);
    const version = typeof pointer === 'object' && pointer !== null && 'version' in pointer
        ? Number(pointer.version)
        : NaN;

    if (!Number.isInteger(version)) {
        throw new TransientChannelError(`Malformed latest policy pointer: ${text}`);
    }

    return version;
}

/**
 * Policies stored as one object per version plus a `latest.json` pointer, so
 * `fetchLatest` costs two reads however many versions were published.
 * Only the `retention` most recent versions are kept.
 */
export class StoragePolicyChannel implements PolicyChannel {
    constructor(
        private readonly storage: ObjectStorage,
        private readonly retention: number,
        private readonly initial?: PolicyVersion,
    ) {
    }

    async publish(policy: PolicyVersion): Promise<void> {
        const latest = readPointer(await this.storage.download(FOLDER, LATEST));
        const name = getPolicyObjectName(policy.version);

        if (latest !== undefined && policy.version <= latest) {
            const known = await this.fetchVersion(policy.version);

            if (known !== undefined && !isEqual(known.weights, policy.weights)) {
                throw new PolicyConflictError(policy.version);
            }
            return;
        }

        await this.storage.upload(FOLDER, name, encodePolicy(policy));
        await this.storage.upload(FOLDER, LATEST, encodeJson({ version: policy.version }));
        await this.prune(policy.version);

        logger.info(`📤 Published policy v${policy.version}`);
    }

    async fetchLatest(): Promise<PolicyVersion> {
        const latest = readPointer(await this.storage.download(FOLDER, LATEST));

        if (latest === undefined) {
            if (this.initial !== undefined) return copyPolicy(this.initial);
            throw new NotReadyError();
        }

        const policy = await this.fetchVersion(latest);

        if (policy === undefined) {
            throw new TransientChannelError(`Policy v${latest} is announced but not readable yet`);
        }

        return policy;
    }

    async fetchVersion(version: number): Promise<undefined | PolicyVersion> {
        const text = await this.storage.download(FOLDER, getPolicyObjectName(version));
        return text === undefined ? undefined : decodePolicy(text);
    }

    private async prune(latest: number) {
        const keep = new Set(
            Array.from({ length: this.retention }, (_, i) => getPolicyObjectName(latest - i)),
        );
        const outdated = (await this.storage.list(FOLDER))
            .filter((name) => name !== LATEST && !keep.has(name));

        await this.storage.remove(FOLDER, outdated);
    }
}
