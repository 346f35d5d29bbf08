import { ObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { decodeWorkerStatus, encodeWorkerStatus } from '../../../rl-common/Storage/serialize.ts';
import { WorkerStatus } from '../../../rl-common/types.ts';

/**
 * Latest reported status per worker. The trainer reads it to tell a few failed
 * workers apart from a job where every worker is gone.
 */
export interface WorkerStatusBoard {
    report(status: WorkerStatus): Promise<void>;
    statuses(): Promise<WorkerStatus[]>;
}

export class MemoryWorkerStatusBoard implements WorkerStatusBoard {
    private latest = new Map<string, WorkerStatus>();

    async report(status: WorkerStatus): Promise<void> {
        this.latest.set(status.workerId, { ...status });
    }

    async statuses(): Promise<WorkerStatus[]> {
        return Array.from(this.latest.values(), (status) => ({ ...status }));
    }
}

const FOLDER = 'workers';

export class StorageWorkerStatusBoard implements WorkerStatusBoard {
    constructor(private readonly storage: ObjectStorage) {
    }

    async report(status: WorkerStatus): Promise<void> {
        await this.storage.upload(FOLDER, `${encodeURIComponent(status.workerId)}.json`, encodeWorkerStatus(status));
    }

    async statuses(): Promise<WorkerStatus[]> {
        const names = await this.storage.list(FOLDER);
        const texts = await Promise.all(names.map((name) => this.storage.download(FOLDER, name)));

        return texts
            .filter((text): text is string => text !== undefined)
            .map(decodeWorkerStatus);
    }
}
