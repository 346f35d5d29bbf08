import { ReplaySubject } from 'rxjs';
import { MetricExport } from '../../../rl-common/Metrics/exportMetrics.ts';
import { ObjectStorage } from '../../../rl-common/Storage/ObjectStorage.ts';
import { encodeJson } from '../../../rl-common/Storage/serialize.ts';
import { JobState } from '../../../rl-common/types.ts';

export type JobReport = {
    state: JobState,
    iterations: number,
    policyVersion: number,
    reason: string,
    metrics: MetricExport[],
}

/**
 * The scheduler side of a job: it asks for cancellation and receives the terminal report.
 */
export interface JobLifecycleController {
    isCancelRequested(): Promise<boolean>;
    reportCompletion(report: JobReport): Promise<void>;
}

export class ManualJobController implements JobLifecycleController {
    private cancelled = false;

    public readonly report$ = new ReplaySubject<JobReport>(1);

    cancel() {
        this.cancelled = true;
    }

    async isCancelRequested(): Promise<boolean> {
        return this.cancelled;
    }

    async reportCompletion(report: JobReport): Promise<void> {
        this.report$.next(report);
        this.report$.complete();
    }
}

const CONTROL_FOLDER = 'control';
const CANCEL = 'cancel.json';
const REPORT_FOLDER = 'report';
const REPORT = 'final.json';

export class StorageJobController implements JobLifecycleController {
    constructor(private readonly storage: ObjectStorage) {
    }

    async requestCancel(requestedAt: number = Date.now()): Promise<void> {
        await this.storage.upload(CONTROL_FOLDER, CANCEL, encodeJson({ requestedAt }));
    }

    async isCancelRequested(): Promise<boolean> {
        return (await this.storage.download(CONTROL_FOLDER, CANCEL)) !== undefined;
    }

    async reportCompletion(report: JobReport): Promise<void> {
        await this.storage.upload(REPORT_FOLDER, REPORT, JSON.stringify(report, null, 2));
    }
}
