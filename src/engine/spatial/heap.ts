interface HeapEntry<T> {
    key: string;
    item: T;
    priority: number;
}

/**
 * Binary min-heap with decrease-key, used as the A* open set.
 *
 * Items are identified by `keyFn`, so the same cell queued twice is one entry.
 * insert, extractMin and decreaseKey are O(log n); has and size are O(1).
 */
export class MinHeap<T> {
    private entries: HeapEntry<T>[] = [];
    private slots = new Map<string, number>(); // key -> index in entries

    constructor(private readonly keyFn: (item: T) => string) { }

    /**
     * Queue an item. An item already queued keeps the lower of its two priorities.
     */
    insert(item: T, priority: number): void {
        const key = this.keyFn(item);
        if (this.slots.has(key)) {
            this.decreaseKey(item, priority);
            return;
        }

        this.place(this.entries.length, { key, item, priority });
        this.siftUp(this.entries.length - 1);
    }

    peek(): T | undefined {
        return this.entries[0]?.item;
    }

    extractMin(): T | undefined {
        const top = this.entries[0];
        const tail = this.entries.pop();
        if (top === undefined || tail === undefined) return undefined;

        this.slots.delete(top.key);
        if (this.entries.length > 0) {
            this.place(0, tail);
            this.siftDown(0);
        }

        return top.item;
    }

    /**
     * No-op when the item is not queued or `priority` is not lower
     */
    decreaseKey(item: T, priority: number): void {
        const index = this.slots.get(this.keyFn(item));
        if (index === undefined || priority >= this.entries[index].priority) return;

        this.entries[index].priority = priority;
        this.entries[index].item = item;
        this.siftUp(index);
    }

    has(item: T): boolean {
        return this.slots.has(this.keyFn(item));
    }

    isEmpty(): boolean {
        return this.entries.length === 0;
    }

    size(): number {
        return this.entries.length;
    }

    private place(index: number, entry: HeapEntry<T>): void {
        this.entries[index] = entry;
        this.slots.set(entry.key, index);
    }

    private less(a: number, b: number): boolean {
        return this.entries[a].priority < this.entries[b].priority;
    }

    private swap(a: number, b: number): void {
        const first = this.entries[a];
        this.place(a, this.entries[b]);
        this.place(b, first);
    }

    private siftUp(index: number): void {
        let child = index;
        while (child > 0) {
            const parent = (child - 1) >> 1;
            if (!this.less(child, parent)) return;
            this.swap(child, parent);
            child = parent;
        }
    }

    private siftDown(index: number): void {
        const count = this.entries.length;
        let parent = index;

        for (;;) {
            const left = 2 * parent + 1;
            const right = left + 1;
            let smallest = parent;

            if (left < count && this.less(left, smallest)) smallest = left;
            if (right < count && this.less(right, smallest)) smallest = right;
            if (smallest === parent) return;

            this.swap(parent, smallest);
            parent = smallest;
        }
    }
}
