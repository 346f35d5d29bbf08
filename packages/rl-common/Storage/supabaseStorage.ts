import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { get } from 'lodash-es';
import { throwingError } from '../../../lib/throwingError.ts';
import { TransientChannelError } from '../errors.ts';
import { ObjectStorage } from './ObjectStorage.ts';

const LIST_PAGE_SIZE = 1000;

export type SupabaseSettings = {
    url: string,
    key: string,
    bucket: string,
    experiment: string,
}

export function readSupabaseSettings(env: NodeJS.ProcessEnv = process.env): SupabaseSettings {
    return {
        url: env.SUPABASE_URL || throwingError('SUPABASE_URL not set'),
        key: env.SUPABASE_KEY || throwingError('SUPABASE_KEY not set'),
        bucket: env.SUPABASE_BUCKET || throwingError('SUPABASE_BUCKET not set'),
        experiment: env.RL_EXPERIMENT || throwingError('RL_EXPERIMENT not set'),
    };
}

export function createSupabaseClient({ url, key }: SupabaseSettings): SupabaseClient {
    return createClient(url, key, {
        global: {
            headers: {
                apikey: key,
                Authorization: `Bearer ${key}`,
            },
        },
        auth: {
            persistSession: false,
        },
    });
}

function isMissingObject(error: unknown): boolean {
    const status = Number(get(error, 'status') ?? get(error, 'statusCode'));
    return status === 404 || /not found/i.test(String(get(error, 'message') ?? ''));
}

function toChannelError(action: string, error: unknown): TransientChannelError {
    return new TransientChannelError(`Supabase ${action} failed: ${get(error, 'message') ?? 'Unknown error'}`, { cause: error });
}

/**
 * Supabase Storage bucket as {@link ObjectStorage}; every folder is placed under the experiment name.
 * Transport and API failures surface as {@link TransientChannelError}.
 */
export class SupabaseObjectStorage implements ObjectStorage {
    constructor(
        private readonly client: SupabaseClient,
        private readonly bucket: string,
        private readonly experiment: string,
    ) {
    }

    async upload(folder: string, name: string, body: string): Promise<void> {
        const { error } = await this.client.storage
            .from(this.bucket)
            .upload(this.path(folder, name), body, {
                contentType: 'application/json',
                upsert: true,
            });

        if (error) {
            throw toChannelError(`upload of ${folder}/${name}`, error);
        }
    }

    async download(folder: string, name: string): Promise<undefined | string> {
        const { data, error } = await this.client.storage
            .from(this.bucket)
            .download(this.path(folder, name));

        if (error) {
            if (isMissingObject(error)) return undefined;
            throw toChannelError(`download of ${folder}/${name}`, error);
        }

        return data.text();
    }

    async list(folder: string): Promise<string[]> {
        const names: string[] = [];

        for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
            const { data, error } = await this.client.storage
                .from(this.bucket)
                .list(`${this.experiment}/${folder}`, {
                    limit: LIST_PAGE_SIZE,
                    offset,
                    sortBy: { column: 'name', order: 'asc' },
                });

            if (error) {
                throw toChannelError(`listing of ${folder}`, error);
            }

            names.push(...data.map((file) => file.name).filter((name) => name.length > 0));

            if (data.length < LIST_PAGE_SIZE) break;
        }

        return names.sort();
    }

    async remove(folder: string, names: string[]): Promise<void> {
        if (names.length === 0) return;

        const { error } = await this.client.storage
            .from(this.bucket)
            .remove(names.map((name) => this.path(folder, name)));

        if (error) {
            throw toChannelError(`removal from ${folder}`, error);
        }
    }

    private path(folder: string, name: string) {
        return `${this.experiment}/${folder}/${name}`;
    }
}
