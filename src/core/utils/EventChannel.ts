/**
 * Unbounded single-consumer queue. Producers (a timer, the keyboard) push
 * without waiting; one `for await` loop drains events strictly in order,
 * so nothing the consumer owns is ever touched concurrently.
 */
export class EventChannel<T> implements AsyncIterable<T> {
    private buffer: T[] = [];
    private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
    private closed = false;

    public push(event: T): boolean {
        if (this.closed) return false;
        if (this.waiting) {
            const resolve = this.waiting;
            this.waiting = null;
            resolve({ value: event, done: false });
        } else {
            this.buffer.push(event);
        }
        return true;
    }

    /**
     * Stops accepting events. Already buffered events are still delivered.
     */
    public close() {
        this.closed = true;
        if (this.waiting) {
            const resolve = this.waiting;
            this.waiting = null;
            resolve({ value: undefined, done: true });
        }
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public next(): Promise<IteratorResult<T, undefined>> {
        const head = this.buffer.shift();
        if (head !== undefined) {
            return Promise.resolve({ value: head, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => {
            this.waiting = resolve;
        });
    }

    public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return { next: () => this.next() };
    }
}
