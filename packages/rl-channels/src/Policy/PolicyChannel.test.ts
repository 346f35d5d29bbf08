import { describe, expect, it, vi } from 'vitest';
import { NotReadyError, PolicyConflictError, TransientChannelError } from '../../../rl-common/errors.ts';
import { MemoryObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { encodeJson } from '../../../rl-common/Storage/serialize.ts';
import { createPolicy } from '../../../rl-common/Testing/fixtures.ts';
import { PolicyVersion } from '../../../rl-common/types.ts';
import { MemoryPolicyChannel } from './MemoryPolicyChannel.ts';
import { PolicyChannel, PolicyReader } from './PolicyChannel.ts';
import { getPolicyObjectName, StoragePolicyChannel } from './StoragePolicyChannel.ts';

type CreateChannel = (options: { retention: number, initial?: PolicyVersion }) => PolicyChannel;

const channels: { name: string, create: CreateChannel }[] = [
    { name: 'MemoryPolicyChannel', create: (options) => new MemoryPolicyChannel(options) },
    {
        name: 'StoragePolicyChannel',
        create: ({ retention, initial }) => new StoragePolicyChannel(new MemoryObjectStorage(), retention, initial),
    },
];

describe.each(channels)('$name', ({ create }) => {
    it('is not ready before the first version', async () => {
        await expect(create({ retention: 3 }).fetchLatest()).rejects.toBeInstanceOf(NotReadyError);
    });

    it('serves a configured initial version', async () => {
        const channel = create({ retention: 3, initial: createPolicy(0, [7]) });

        expect(await channel.fetchLatest()).toEqual(createPolicy(0, [7]));
    });

    it('returns the highest published version', async () => {
        const channel = create({ retention: 3 });

        await channel.publish(createPolicy(1));
        await channel.publish(createPolicy(2));
        await channel.publish(createPolicy(1));

        expect((await channel.fetchLatest()).version).toBe(2);
    });

    it('accepts the same version with the same weights again', async () => {
        const channel = create({ retention: 3 });

        await channel.publish(createPolicy(1, [1, 2]));
        await channel.publish(createPolicy(1, [1, 2]));

        expect(await channel.fetchVersion(1)).toEqual(createPolicy(1, [1, 2]));
    });

    it('rejects a version republished with different weights', async () => {
        const channel = create({ retention: 3 });

        await channel.publish(createPolicy(1, [1]));

        await expect(channel.publish(createPolicy(1, [9]))).rejects.toBeInstanceOf(PolicyConflictError);
        expect((await channel.fetchLatest()).weights).toEqual(new Uint8Array([1]));
    });

    it('keeps only the most recent versions', async () => {
        const channel = create({ retention: 2 });

        for (const version of [0, 1, 2, 3]) {
            await channel.publish(createPolicy(version));
        }

        expect(await channel.fetchVersion(1)).toBeUndefined();
        expect((await channel.fetchVersion(2))?.version).toBe(2);
        expect((await channel.fetchLatest()).version).toBe(3);
    });

    it('is not affected by later changes to published weights', async () => {
        const channel = create({ retention: 2 });
        const policy = createPolicy(1, [5]);

        await channel.publish(policy);
        policy.weights[0] = 6;

        expect((await channel.fetchLatest()).weights).toEqual(new Uint8Array([5]));
    });

    it('is not affected by changes a caller makes to fetched weights', async () => {
        const channel = create({ retention: 2 });

        await channel.publish(createPolicy(1, [5]));
        (await channel.fetchLatest()).weights[0] = 99;
        const fetched = await channel.fetchVersion(1);
        if (fetched !== undefined) fetched.weights[0] = 98;

        expect((await channel.fetchLatest()).weights).toEqual(new Uint8Array([5]));
        expect((await channel.fetchVersion(1))?.weights).toEqual(new Uint8Array([5]));
        await expect(channel.publish(createPolicy(1, [5]))).resolves.toBeUndefined();
    });
});

describe('MemoryPolicyChannel', () => {
    it('announces each version once', async () => {
        const channel = new MemoryPolicyChannel({ retention: 3 });
        const seen: number[] = [];
        const subscription = channel.version$.subscribe((policy) => seen.push(policy.version));

        await channel.publish(createPolicy(0));
        await channel.publish(createPolicy(0));
        await channel.publish(createPolicy(1));
        subscription.unsubscribe();

        expect(seen).toEqual([0, 1]);
    });
});

describe('StoragePolicyChannel', () => {
    it('writes nothing for a repeated publish', async () => {
        const storage = new MemoryObjectStorage();
        const channel = new StoragePolicyChannel(storage, 3);

        await channel.publish(createPolicy(1));
        const upload = vi.spyOn(storage, 'upload');
        await channel.publish(createPolicy(1));

        expect(upload).not.toHaveBeenCalled();
        expect(await storage.list('policies')).toEqual(['latest.json', getPolicyObjectName(1)]);
    });

    it('reports an announced version that cannot be read yet as transient', async () => {
        const storage = new MemoryObjectStorage();
        const channel = new StoragePolicyChannel(storage, 3);

        await storage.upload('policies', 'latest.json', encodeJson({ version: 4 }));

        await expect(channel.fetchLatest()).rejects.toBeInstanceOf(TransientChannelError);
    });
});

describe('PolicyReader', () => {
    it('never goes back to an older version', async () => {
        const versions = [3, 1, 4];
        const channel: PolicyChannel = {
            publish: async () => undefined,
            fetchLatest: async () => createPolicy(versions.shift() ?? 0),
            fetchVersion: async () => undefined,
        };
        const reader = new PolicyReader(channel);

        expect((await reader.fetchLatest()).version).toBe(3);
        expect((await reader.fetchLatest()).version).toBe(3);
        expect((await reader.fetchLatest()).version).toBe(4);
        expect(reader.current()?.version).toBe(4);
    });
});
