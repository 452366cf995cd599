import { netLogger } from '../logger.js';

export type Listener<T> = (message: T) => void;

/**
 * Fan-out of world snapshots. Publishing is synchronous and never waits on a
 * subscriber; each listener decides on its own whether it can keep up.
 */
export class Broadcaster<T> {
    private listeners: Set<Listener<T>> = new Set();

    get subscriberCount(): number {
        return this.listeners.size;
    }

    subscribe(listener: Listener<T>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    publish(message: T) {
        // Snapshot so a listener unsubscribing mid-publish does not skip its neighbour
        for (const listener of [...this.listeners]) {
            try {
                listener(message);
            } catch (error) {
                netLogger.warn({ err: error }, 'Broadcast listener failed');
            }
        }
    }
}
