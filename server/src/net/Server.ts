import { WebSocketServer, WebSocket } from 'ws';
import type { AddressInfo } from 'node:net';
import type { RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { GameManager } from '../game/GameManager.js';
import { PlayerConnection } from './PlayerConnection.js';
import type { Transport } from './PlayerConnection.js';
import { logServerStarted, netLogger } from '../logger.js';

export const GAME_PATH = '/game';

export interface GameServerOptions {
    host: string;
    port: number;
    highWaterBytes: number;
}

// Player ids are u32 and handed out in accept order
const MAX_PLAYER_ID = 0xffffffff;

export function nextPlayerId(id: number): number {
    return id === MAX_PLAYER_ID ? 0 : id + 1;
}

export function socketTransport(ws: WebSocket): Transport {
    return {
        send: (data: string) => new Promise<void>((resolve, reject) => {
            if (ws.readyState !== WebSocket.OPEN) {
                reject(new Error(`Socket not open (state ${ws.readyState})`));
                return;
            }
            ws.send(data, (error) => (error ? reject(error) : resolve()));
        }),
        bufferedAmount: () => ws.bufferedAmount
    };
}

export function rawToText(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
}

type ListenState =
    | { status: 'starting' }
    | { status: 'listening' }
    | { status: 'failed'; error: Error };

export class GameServer {
    private wss: WebSocketServer;
    private game: GameManager;
    private options: GameServerOptions;
    private nextId = 0;
    private listenState: ListenState = { status: 'starting' };

    constructor(game: GameManager, options: GameServerOptions) {
        this.game = game;
        this.options = options;
        this.wss = new WebSocketServer({ host: options.host, port: options.port, path: GAME_PATH });

        this.wss.on('connection', (ws) => this.handleConnection(ws));
        this.wss.on('listening', () => {
            this.listenState = { status: 'listening' };
            const { port } = this.address();
            logServerStarted(options.host, port, GAME_PATH);
        });
        this.wss.on('error', (error) => {
            if (this.listenState.status === 'starting') {
                this.listenState = { status: 'failed', error };
            }
            netLogger.error({ err: error }, 'WebSocket server error');
        });
    }

    /**
     * Resolves once the socket is bound. Rejects with the bind error
     * (EADDRINUSE, EACCES, ...) if binding failed.
     */
    listen(): Promise<void> {
        const state = this.listenState;
        if (state.status === 'listening') return Promise.resolve();
        if (state.status === 'failed') return Promise.reject(state.error);

        return new Promise((resolve, reject) => {
            const onListening = () => {
                this.wss.off('error', onError);
                resolve();
            };
            const onError = (error: Error) => {
                this.wss.off('listening', onListening);
                reject(error);
            };
            this.wss.once('listening', onListening);
            this.wss.once('error', onError);
        });
    }

    address(): AddressInfo {
        const address = this.wss.address();
        if (address === null || typeof address === 'string') {
            throw new Error('GameServer is not bound to a TCP port');
        }
        return address;
    }

    close(): Promise<void> {
        for (const client of this.wss.clients) {
            client.terminate();
        }
        return new Promise((resolve, reject) => {
            this.wss.close((error) => (error ? reject(error) : resolve()));
        });
    }

    private allocateId(): number {
        const id = this.nextId;
        this.nextId = nextPlayerId(id);
        return id;
    }

    private handleConnection(ws: WebSocket) {
        const connection = new PlayerConnection(this.allocateId(), uuidv4(), socketTransport(ws), {
            enqueue: (command) => this.game.enqueue(command),
            sockets: this.game.sockets,
            broadcast: this.game.broadcast,
            highWaterBytes: this.options.highWaterBytes
        });
        connection.open();

        ws.on('message', (data, isBinary) => {
            if (isBinary) {
                netLogger.warn({ playerId: connection.id }, 'Binary message ignored');
                return;
            }
            connection.receive(rawToText(data));
        });

        ws.on('error', (error) => {
            netLogger.warn({ err: error, playerId: connection.id }, 'Socket error');
        });

        ws.on('close', () => connection.close());
    }
}
