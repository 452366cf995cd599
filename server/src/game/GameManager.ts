import { setTimeout as sleep } from 'node:timers/promises';
import { MessageType } from 'shared';
import type { PlayerNotification, StateMessage, Vector2 } from 'shared';
import { Player, radiusAfterEat } from './Player.js';
import { Food } from './Food.js';
import type { RandomSource } from './Food.js';
import { CommandQueue } from './CommandQueue.js';
import { Commands } from './commands.js';
import type { Command, InternalCommand, PlayerCommand } from './commands.js';
import { DEAD_RADIUS, DEFAULT_QUEUE_CAPACITY, DEFAULT_TICK_MS, FOOD_FLOOR } from './constants.js';
import { Broadcaster } from '../net/Broadcaster.js';
import { PlayerSockets } from '../net/PlayerSockets.js';
import { gameLogger, logPlayerEaten, logPlayerJoined } from '../logger.js';

export interface GameManagerOptions {
    queueCapacity?: number;
    random?: RandomSource;
    broadcast?: Broadcaster<StateMessage>;
    sockets?: PlayerSockets;
}

/**
 * Owns the world. Every change goes through the command queue and is
 * applied by a single consumer, one command at a time, in arrival order.
 */
export class GameManager {
    public readonly broadcast: Broadcaster<StateMessage>;
    public readonly sockets: PlayerSockets;

    private players: Player[] = [];
    private food: Food[];
    private commands: CommandQueue<Command>;
    private random: RandomSource;

    // Dead players whose RemovePlayer is already queued
    private pendingRemoval: Set<number> = new Set();

    private running = false;
    private tickAbort: AbortController | null = null;

    constructor(options: GameManagerOptions = {}) {
        this.random = options.random ?? Math.random;
        this.broadcast = options.broadcast ?? new Broadcaster<StateMessage>();
        this.sockets = options.sockets ?? new PlayerSockets();
        this.commands = new CommandQueue<Command>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
        this.food = Food.generate(FOOD_FLOOR, this.random);
    }

    get pendingCommands(): number {
        return this.commands.size;
    }

    getPlayers(): Player[] {
        return [...this.players];
    }

    getFood(): Food[] {
        return [...this.food];
    }

    enqueue(command: Command): Promise<void> {
        return this.commands.send(command);
    }

    /**
     * Start the tick timer and the command consumer.
     * Resolves once `stop()` has closed the intake and the consumer has
     * drained it.
     */
    start(tickMs: number = DEFAULT_TICK_MS): Promise<void> {
        if (this.running) {
            return Promise.reject(new Error('GameManager is already running'));
        }
        this.running = true;
        this.tickAbort = new AbortController();

        this.runUpdateLoop(tickMs, this.tickAbort.signal).catch((error: unknown) => {
            gameLogger.error({ err: error }, 'Update loop crashed');
        });

        return this.listenToCommands().finally(() => {
            this.running = false;
            this.tickAbort?.abort();
            this.tickAbort = null;
        });
    }

    stop() {
        this.tickAbort?.abort();
        this.commands.close();
    }

    /**
     * Apply every command already queued, in order. Only valid while the
     * consumer loop is not running.
     */
    processPending(): number {
        if (this.running) {
            throw new Error('processPending() cannot run alongside the command consumer');
        }
        let processed = 0;
        let command = this.commands.tryReceive();
        while (command !== undefined) {
            this.execute(command);
            processed++;
            command = this.commands.tryReceive();
        }
        return processed;
    }

    execute(command: Command) {
        switch (command.kind) {
            case 'join':
            case 'move':
                this.executePlayerCommand(command);
                break;
            case 'update':
            case 'add_player':
            case 'remove_player':
                this.executeInternalCommand(command);
                break;
        }
    }

    snapshot(): StateMessage {
        return {
            type: MessageType.STATE,
            players: this.players.map(p => p.toState()),
            food: this.food.map(f => f.toState())
        };
    }

    private async runUpdateLoop(tickMs: number, signal: AbortSignal) {
        while (!signal.aborted) {
            const aborted = await sleep(tickMs, undefined, { signal }).then(() => false, () => true);
            if (aborted) return;

            try {
                await this.commands.send(Commands.update());
            } catch (error) {
                gameLogger.error({ err: error }, 'Error sending update command');
                return;
            }
        }
    }

    private async listenToCommands() {
        for (;;) {
            const command = await this.commands.receive();
            // Only stop() closes the intake
            if (command === undefined) return;
            this.execute(command);
        }
    }

    private executePlayerCommand(command: PlayerCommand) {
        switch (command.kind) {
            case 'move':
                this.movePlayer(command.id, command.position);
                break;
            case 'join':
                // Joining is just player creation
                this.executeInternalCommand(Commands.addPlayer(command.id, command.name));
                break;
        }
    }

    private executeInternalCommand(command: InternalCommand) {
        switch (command.kind) {
            case 'update':
                this.update();
                this.broadcast.publish(this.snapshot());
                break;
            case 'add_player':
                this.addPlayer(new Player(command.id, command.name));
                break;
            case 'remove_player':
                this.removePlayer(command.id);
                break;
        }
    }

    private addPlayer(player: Player) {
        this.notify(player.id, { type: MessageType.JOIN_SUCCESS, id: player.id });
        if (this.findPlayer(player.id)) {
            gameLogger.debug({ playerId: player.id }, 'Player already in game, join acknowledged again');
            return;
        }
        this.players.push(player);
        logPlayerJoined(player.id, player.name);
    }

    private removePlayer(id: number) {
        this.pendingRemoval.delete(id);
        if (!this.findPlayer(id)) return;

        // Notify before dropping so the message still finds the player's socket
        this.notify(id, { type: MessageType.PLAYER_EATEN, id });
        this.players = this.players.filter(p => p.id !== id);
        logPlayerEaten(id);
    }

    private movePlayer(id: number, position: Vector2) {
        this.findPlayer(id)?.moveTowards(position);
    }

    private findPlayer(id: number): Player | undefined {
        return this.players.find(p => p.id === id);
    }

    private notify(id: number, message: PlayerNotification) {
        // Fire and forget; dispatch logs its own failures and never rejects
        void this.sockets.dispatch(id, message);
    }

    private update() {
        this.checkCollision();
        this.checkFoodCollision();
        this.removeDeadPlayers();
        this.checkFood();
    }

    /**
     * Every ordered pair is visited, so each overlapping pair is resolved
     * twice and results cascade through the scan. The loser is whichever
     * player is not strictly larger.
     */
    private checkCollision() {
        const players = this.players;
        for (let i = 0; i < players.length; i++) {
            for (let j = 0; j < players.length; j++) {
                const player = players[i];
                const other = players[j];
                if (player.id === other.id) continue;

                const distance = player.position.sub(other.position).magnitude();
                if (distance < player.radius + other.radius) {
                    const merged = radiusAfterEat(player.radius, other.radius);
                    if (player.radius > other.radius) {
                        player.radius = merged;
                        other.radius = 0;
                    } else {
                        other.radius = merged;
                        player.radius = 0;
                    }
                }
            }
        }
    }

    // Reverse order so splicing never skips an item
    private checkFoodCollision() {
        for (let i = this.players.length - 1; i >= 0; i--) {
            const player = this.players[i];
            for (let j = this.food.length - 1; j >= 0; j--) {
                const food = this.food[j];
                const distance = player.position.sub(food.position).magnitude();
                if (distance < player.radius + food.radius) {
                    player.radius = radiusAfterEat(player.radius, food.radius);
                    this.food.splice(j, 1);
                }
            }
        }
    }

    private removeDeadPlayers() {
        for (const player of this.players) {
            if (player.radius > DEAD_RADIUS || this.pendingRemoval.has(player.id)) continue;

            this.pendingRemoval.add(player.id);
            this.commands.send(Commands.removePlayer(player.id)).catch((error: unknown) => {
                gameLogger.error({ err: error, playerId: player.id }, 'Error sending remove player command');
            });
        }
    }

    private checkFood() {
        if (this.food.length < FOOD_FLOOR) {
            this.food.push(...Food.generate(FOOD_FLOOR - this.food.length, this.random));
        }
    }
}
