export class QueueClosedError extends Error {
    constructor() {
        super('Command queue is closed');
        this.name = 'QueueClosedError';
    }
}

interface PendingSend<T> {
    item: T;
    resolve: () => void;
    reject: (error: Error) => void;
}

/**
 * Bounded FIFO shared by many producers and drained by one consumer.
 *
 * `send` appends synchronously while there is room, so a command issued
 * from inside the consumer lands behind everything already queued. When the
 * buffer is full the producer waits for space; nothing is ever dropped.
 */
export class CommandQueue<T> {
    private buffer: T[] = [];
    private blockedSenders: PendingSend<T>[] = [];
    private waitingReceiver: ((item: T | undefined) => void) | null = null;
    private isClosed = false;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.buffer.length;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    send(item: T): Promise<void> {
        if (this.isClosed) {
            return Promise.reject(new QueueClosedError());
        }

        if (this.waitingReceiver) {
            const receiver = this.waitingReceiver;
            this.waitingReceiver = null;
            receiver(item);
            return Promise.resolve();
        }

        if (this.buffer.length < this.capacity) {
            this.buffer.push(item);
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            this.blockedSenders.push({ item, resolve, reject });
        });
    }

    tryReceive(): T | undefined {
        if (this.buffer.length === 0) return undefined;
        const item = this.buffer.shift();
        this.admitBlockedSender();
        return item;
    }

    /** Resolves `undefined` once the queue is closed and empty. */
    receive(): Promise<T | undefined> {
        if (this.buffer.length > 0) {
            return Promise.resolve(this.tryReceive());
        }
        if (this.isClosed) {
            return Promise.resolve(undefined);
        }
        if (this.waitingReceiver) {
            return Promise.reject(new Error('CommandQueue supports a single consumer'));
        }
        return new Promise((resolve) => {
            this.waitingReceiver = resolve;
        });
    }

    close() {
        if (this.isClosed) return;
        this.isClosed = true;

        for (const pending of this.blockedSenders) {
            pending.reject(new QueueClosedError());
        }
        this.blockedSenders = [];

        if (this.waitingReceiver && this.buffer.length === 0) {
            const receiver = this.waitingReceiver;
            this.waitingReceiver = null;
            receiver(undefined);
        }
    }

    private admitBlockedSender() {
        const pending = this.blockedSenders.shift();
        if (!pending) return;
        this.buffer.push(pending.item);
        pending.resolve();
    }
}
