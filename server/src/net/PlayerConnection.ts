import { MessageType } from 'shared';
import type { ClientMessage, PlayerNotification, ServerMessage, StateMessage } from 'shared';
import { Commands } from '../game/commands.js';
import type { Command } from '../game/commands.js';
import type { Broadcaster } from './Broadcaster.js';
import type { PlayerSockets } from './PlayerSockets.js';
import { parseClientMessage } from './parse.js';
import { logPlayerConnected, logPlayerDisconnected, netLogger } from '../logger.js';

/** The slice of a socket a connection needs. */
export interface Transport {
    send(data: string): Promise<void>;
    // Bytes queued but not yet written to the network
    bufferedAmount(): number;
}

export interface ConnectionContext {
    enqueue: (command: Command) => Promise<void>;
    sockets: PlayerSockets;
    broadcast: Broadcaster<StateMessage>;
    // Above this, snapshots are skipped until the socket drains
    highWaterBytes: number;
}

export class PlayerConnection {
    public readonly id: number;
    public readonly sessionId: string;
    private transport: Transport;
    private context: ConnectionContext;
    private unsubscribe: (() => void) | null = null;
    private skippedSnapshots = 0;

    constructor(id: number, sessionId: string, transport: Transport, context: ConnectionContext) {
        this.id = id;
        this.sessionId = sessionId;
        this.transport = transport;
        this.context = context;
    }

    get isOpen(): boolean {
        return this.unsubscribe !== null;
    }

    open() {
        if (this.isOpen) return;
        logPlayerConnected(this.id, this.sessionId);

        // Register first so JoinSuccess can find this socket
        this.context.sockets.register(this.id, {
            send: (message: PlayerNotification) => this.transport.send(JSON.stringify(message))
        });
        this.unsubscribe = this.context.broadcast.subscribe((message) => this.onSnapshot(message));
    }

    receive(text: string) {
        const result = parseClientMessage(text);
        if (!result.ok) {
            netLogger.warn({ playerId: this.id, sessionId: this.sessionId, error: result.error }, 'Invalid message');
            return;
        }

        netLogger.trace({ playerId: this.id, type: result.message.type }, 'Received message from client');
        this.forward(this.toCommand(result.message));
    }

    close() {
        if (!this.unsubscribe) return;
        this.unsubscribe();
        this.unsubscribe = null;
        this.context.sockets.unregister(this.id);
        logPlayerDisconnected(this.id, this.sessionId);

        this.forward(Commands.removePlayer(this.id));
    }

    private toCommand(message: ClientMessage): Command {
        switch (message.type) {
            case MessageType.JOIN:
                return Commands.join(this.id, message.name);
            case MessageType.MOVE:
                return Commands.move(this.id, message.position);
        }
    }

    private forward(command: Command) {
        this.context.enqueue(command).catch((error: unknown) => {
            netLogger.error({ err: error, playerId: this.id, kind: command.kind }, 'Error sending message to game manager');
        });
    }

    // Latest state wins: a backed-up client simply misses intermediate snapshots
    private onSnapshot(message: StateMessage) {
        if (this.transport.bufferedAmount() > this.context.highWaterBytes) {
            this.skippedSnapshots++;
            if (this.skippedSnapshots === 1) {
                netLogger.debug({ playerId: this.id }, 'Client lagging, skipping snapshots');
            }
            return;
        }
        this.skippedSnapshots = 0;
        this.send(message);
    }

    private send(message: ServerMessage) {
        this.transport.send(JSON.stringify(message)).catch((error: unknown) => {
            netLogger.warn({ err: error, playerId: this.id }, 'Error sending message to client');
        });
    }
}
