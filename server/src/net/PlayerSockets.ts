import type { PlayerNotification } from 'shared';
import { netLogger } from '../logger.js';

/** Anything that can deliver a message to one player. May fail. */
export interface PlayerSink {
    send(message: PlayerNotification): Promise<void>;
}

interface SinkEntry {
    sink: PlayerSink;
    // Tail of this player's send chain
    pending: Promise<void>;
}

/**
 * Id-keyed table of player sinks shared between the connection path and the
 * game manager. Sends to one player run in order; sends to different
 * players are independent of each other.
 */
export class PlayerSockets {
    private entries: Map<number, SinkEntry> = new Map();

    get size(): number {
        return this.entries.size;
    }

    register(id: number, sink: PlayerSink) {
        this.entries.set(id, { sink, pending: Promise.resolve() });
    }

    unregister(id: number): boolean {
        return this.entries.delete(id);
    }

    has(id: number): boolean {
        return this.entries.has(id);
    }

    /**
     * Queue a message for one player without waiting for it.
     * The returned promise settles once this send has finished or failed;
     * callers on the simulation path ignore it.
     */
    dispatch(id: number, message: PlayerNotification): Promise<void> {
        const entry = this.entries.get(id);
        if (!entry) {
            netLogger.debug({ playerId: id, type: message.type }, 'No socket for player, message dropped');
            return Promise.resolve();
        }

        const send = entry.pending
            .then(() => entry.sink.send(message))
            .catch((error: unknown) => {
                netLogger.warn({ err: error, playerId: id, type: message.type }, 'Error sending message to player');
            });
        entry.pending = send;
        return send;
    }
}
