// Set that forgets its oldest entries beyond `capacity`.
export class BoundedSet<T> {
    private items = new Set<T>();

    constructor(private readonly capacity: number) {
    }

    get size(): number {
        return this.items.size;
    }

    has(item: T): boolean {
        return this.items.has(item);
    }

    add(item: T): this {
        this.items.delete(item);
        this.items.add(item);

        for (const oldest of this.items) {
            if (this.items.size <= this.capacity) break;
            this.items.delete(oldest);
        }

        return this;
    }
}
