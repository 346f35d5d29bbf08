import { z } from 'zod';
import { ObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { decodeJson, encodeJson } from '../../../rl-common/Storage/serialize.ts';

export type StopNotice = {
    reason: string,
    requestedAt: number,
}

/**
 * Advisory stop notification from the trainer to the workers.
 * Workers look at it on episode boundaries; the first request wins.
 */
export interface StopSignal {
    requestStop(notice: StopNotice): Promise<void>;
    read(): Promise<undefined | StopNotice>;
}

export class MemoryStopSignal implements StopSignal {
    private notice: undefined | StopNotice;

    async requestStop(notice: StopNotice): Promise<void> {
        this.notice ??= { ...notice };
    }

    async read(): Promise<undefined | StopNotice> {
        return this.notice;
    }
}

const FOLDER = 'control';
const STOP = 'stop.json';

const stopNoticeSchema = z.object({
    reason: z.string(),
    requestedAt: z.number(),
});

export class StorageStopSignal implements StopSignal {
    constructor(private readonly storage: ObjectStorage) {
    }

    async requestStop(notice: StopNotice): Promise<void> {
        if (await this.read() !== undefined) return;
        await this.storage.upload(FOLDER, STOP, encodeJson(notice));
    }

    async read(): Promise<undefined | StopNotice> {
        const text = await this.storage.download(FOLDER, STOP);
        return text === undefined ? undefined : stopNoticeSchema.parse(decodeJson(text));
    }
}
