/**
 * Flat key/value object store shared by processes that have no memory in common.
 * Objects live in folders; `list` returns the object names of one folder in ascending order.
 */
export interface ObjectStorage {
    upload(folder: string, name: string, body: string): Promise<void>;
    download(folder: string, name: string): Promise<undefined | string>;
    list(folder: string): Promise<string[]>;
    remove(folder: string, names: string[]): Promise<void>;
}

export class MemoryObjectStorage implements ObjectStorage {
    private folders = new Map<string, Map<string, string>>();

    async upload(folder: string, name: string, body: string): Promise<void> {
        this.getFolder(folder).set(name, body);
    }

    async download(folder: string, name: string): Promise<undefined | string> {
        return this.folders.get(folder)?.get(name);
    }

    async list(folder: string): Promise<string[]> {
        return Array.from(this.folders.get(folder)?.keys() ?? []).sort();
    }

    async remove(folder: string, names: string[]): Promise<void> {
        const objects = this.folders.get(folder);
        names.forEach((name) => objects?.delete(name));
    }

    private getFolder(folder: string) {
        let objects = this.folders.get(folder);
        if (objects === undefined) {
            objects = new Map();
            this.folders.set(folder, objects);
        }
        return objects;
    }
}
