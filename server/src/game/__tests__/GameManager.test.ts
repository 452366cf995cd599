import { describe, it, expect, beforeEach } from 'vitest';
import { MessageType } from 'shared';
import type { PlayerNotification, StateMessage } from 'shared';
import { GameManager } from '../GameManager.js';
import { Commands } from '../commands.js';
import { mass } from '../Player.js';
import type { Player } from '../Player.js';
import { FOOD_FLOOR } from '../constants.js';
import type { PlayerSink } from '../../net/PlayerSockets.js';

// ============================================
// Helpers
// ============================================

interface RecordingSink extends PlayerSink {
    sent: PlayerNotification[];
}

function recordingSink(): RecordingSink {
    const sent: PlayerNotification[] = [];
    return {
        sent,
        send: async (message) => {
            sent.push(message);
        }
    };
}

// Lets fire-and-forget sends settle
function flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

// Every food item lands at (400, 300) with radius 4, far from the spawn point
const centredFood = () => 0.5;
// Every food item lands at (2, 2) with radius 2, inside a fresh player
const foodAtSpawn = () => 0;

function requirePlayer(game: GameManager, id: number): Player {
    const player = game.getPlayers().find(p => p.id === id);
    if (!player) throw new Error(`player ${id} not found`);
    return player;
}

function collectStates(game: GameManager): StateMessage[] {
    const states: StateMessage[] = [];
    game.broadcast.subscribe((message) => states.push(message));
    return states;
}

// ============================================
// Tests
// ============================================

describe('GameManager', () => {
    let game: GameManager;

    beforeEach(() => {
        game = new GameManager({ random: centredFood });
    });

    describe('initial state', () => {
        it('starts with an empty arena stocked with food', () => {
            expect(game.getPlayers()).toHaveLength(0);
            expect(game.getFood()).toHaveLength(FOOD_FLOOR);
        });
    });

    describe('joining', () => {
        it('creates the player and acknowledges the join to that player only', async () => {
            const alice = recordingSink();
            const bob = recordingSink();
            game.sockets.register(1, alice);
            game.sockets.register(2, bob);

            game.execute(Commands.join(1, 'alice'));
            await flush();

            const player = requirePlayer(game, 1);
            expect(player.name).toBe('alice');
            expect(player.radius).toBe(10);
            expect(player.position.toJSON()).toEqual({ x: 0, y: 0 });
            expect(alice.sent).toEqual([{ type: MessageType.JOIN_SUCCESS, id: 1 }]);
            expect(bob.sent).toEqual([]);
        });

        it('treats AddPlayer exactly like Join', () => {
            game.execute(Commands.addPlayer(5, 'eve'));
            expect(game.getPlayers().map(p => p.toState())).toEqual([
                { id: 5, name: 'eve', position: { x: 0, y: 0 }, radius: 10 }
            ]);
        });

        it('does not duplicate a player who joins twice', async () => {
            const sink = recordingSink();
            game.sockets.register(1, sink);

            game.execute(Commands.join(1, 'alice'));
            game.execute(Commands.join(1, 'alice again'));
            await flush();

            expect(game.getPlayers()).toHaveLength(1);
            expect(requirePlayer(game, 1).name).toBe('alice');
            expect(sink.sent).toHaveLength(2);
        });
    });

    describe('moving', () => {
        it('ignores moves from unknown players', () => {
            game.execute(Commands.join(1, 'alice'));
            game.execute(Commands.move(99, { x: 500, y: 500 }));
            expect(requirePlayer(game, 1).position.toJSON()).toEqual({ x: 0, y: 0 });
        });

        it('advances a player steadily towards its target and never past it', () => {
            game.execute(Commands.join(1, 'alice'));
            const player = requirePlayer(game, 1);

            let previousX = player.position.x;
            for (let tick = 0; tick < 400; tick++) {
                game.execute(Commands.move(1, { x: 1000, y: 0 }));
                game.execute(Commands.update());

                expect(player.position.x).toBeGreaterThanOrEqual(previousX);
                expect(player.position.x).toBeLessThanOrEqual(1000);
                expect(player.position.y).toBe(0);
                previousX = player.position.x;
            }

            expect(player.position.x).toBeGreaterThan(1000 - player.speed());
        });
    });

    describe('player collisions', () => {
        it('lets the second of two equal players eat the first', () => {
            game.execute(Commands.join(1, 'a'));
            game.execute(Commands.join(2, 'b'));

            game.execute(Commands.update());

            const a = requirePlayer(game, 1);
            const b = requirePlayer(game, 2);
            expect(a.radius).toBe(0);
            expect(b.radius).toBeCloseTo(Math.SQRT2 * 10, 5);
            expect(mass(b.radius)).toBeCloseTo(2 * mass(10), 5);
        });

        it('resolves the tie the same way on every run', () => {
            const outcomes = Array.from({ length: 5 }, () => {
                const run = new GameManager({ random: centredFood });
                run.execute(Commands.join(1, 'a'));
                run.execute(Commands.join(2, 'b'));
                run.execute(Commands.update());
                return run.getPlayers().map(p => p.radius);
            });

            for (const radii of outcomes) {
                expect(radii).toEqual(outcomes[0]);
            }
        });

        it('leaves players that do not overlap alone', () => {
            game.execute(Commands.join(1, 'a'));
            game.execute(Commands.join(2, 'b'));
            const b = requirePlayer(game, 2);
            for (let i = 0; i < 10; i++) {
                game.execute(Commands.move(2, { x: 1000, y: -1000 }));
            }
            // About 39.9 apart against a combined radius of 20
            game.execute(Commands.update());

            expect(requirePlayer(game, 1).radius).toBe(10);
            expect(b.radius).toBe(10);
            expect(game.pendingCommands).toBe(0);
        });

        it('cascades through the scan so the largest player ends up with all the mass', () => {
            game.execute(Commands.join(1, 'small'));
            game.execute(Commands.join(2, 'medium'));
            game.execute(Commands.join(3, 'large'));
            requirePlayer(game, 1).radius = 5;
            requirePlayer(game, 2).radius = 10;
            requirePlayer(game, 3).radius = 20;

            game.execute(Commands.update());

            expect(requirePlayer(game, 1).radius).toBe(0);
            expect(requirePlayer(game, 2).radius).toBe(0);
            expect(requirePlayer(game, 3).radius).toBeCloseTo(Math.sqrt(525), 5);
        });
    });

    describe('food', () => {
        it('grows a player by the food it overlaps and restocks the arena', () => {
            const hungry = new GameManager({ random: foodAtSpawn });
            hungry.execute(Commands.join(1, 'alice'));

            hungry.execute(Commands.update());

            // 50 items of radius 2: r^2 = 100 + 50 * 4
            expect(requirePlayer(hungry, 1).radius).toBeCloseTo(Math.sqrt(300), 5);
            expect(hungry.getFood()).toHaveLength(FOOD_FLOOR);
        });

        it('keeps at least the food floor after every update', () => {
            const hungry = new GameManager({ random: foodAtSpawn });
            hungry.execute(Commands.join(1, 'alice'));
            for (let tick = 0; tick < 5; tick++) {
                hungry.execute(Commands.update());
                expect(hungry.getFood().length).toBeGreaterThanOrEqual(FOOD_FLOOR);
            }
        });
    });

    describe('reaping', () => {
        it('queues the removal instead of dropping the dead player mid-tick', () => {
            game.execute(Commands.join(1, 'a'));
            game.execute(Commands.join(2, 'b'));

            game.execute(Commands.update());

            expect(game.getPlayers()).toHaveLength(2);
            expect(game.pendingCommands).toBe(1);
        });

        it('removes the loser after its RemovePlayer and notifies it exactly once', async () => {
            const a = recordingSink();
            const b = recordingSink();
            game.sockets.register(1, a);
            game.sockets.register(2, b);
            const states = collectStates(game);

            game.execute(Commands.join(1, 'a'));
            game.execute(Commands.join(2, 'b'));
            game.execute(Commands.update());
            // A second tick before the removal is processed must not schedule it again
            game.execute(Commands.update());
            expect(game.pendingCommands).toBe(1);

            expect(game.processPending()).toBe(1);
            game.execute(Commands.update());
            await flush();

            expect(game.getPlayers().map(p => p.id)).toEqual([2]);
            expect(a.sent).toEqual([
                { type: MessageType.JOIN_SUCCESS, id: 1 },
                { type: MessageType.PLAYER_EATEN, id: 1 }
            ]);
            expect(b.sent).toEqual([{ type: MessageType.JOIN_SUCCESS, id: 2 }]);

            expect(states).toHaveLength(3);
            expect(states[0].players.map(p => p.id)).toEqual([1, 2]);
            const last = states[2];
            expect(last.players).toHaveLength(1);
            expect(last.players[0].id).toBe(2);
            expect(last.players[0].radius).toBeCloseTo(Math.SQRT2 * 10, 5);
        });

        it('ignores RemovePlayer for a player that is not in the game', async () => {
            const sink = recordingSink();
            game.sockets.register(9, sink);

            game.execute(Commands.removePlayer(9));
            await flush();

            expect(sink.sent).toEqual([]);
        });

        it('removes a disconnected player that is still alive', () => {
            game.execute(Commands.join(1, 'a'));
            game.execute(Commands.removePlayer(1));
            expect(game.getPlayers()).toHaveLength(0);
        });
    });

    describe('snapshots', () => {
        it('publishes one full state per update', () => {
            const states = collectStates(game);
            game.execute(Commands.join(1, 'alice'));

            game.execute(Commands.update());

            expect(states).toHaveLength(1);
            expect(states[0].type).toBe(MessageType.STATE);
            expect(states[0].players).toEqual([
                { id: 1, name: 'alice', position: { x: 0, y: 0 }, radius: 10 }
            ]);
            expect(states[0].food).toHaveLength(FOOD_FLOOR);
            expect(states[0].food[0]).toEqual({ position: { x: 400, y: 300 }, radius: 4 });
        });

        it('publishes nothing for commands other than update', () => {
            const states = collectStates(game);
            game.execute(Commands.join(1, 'alice'));
            game.execute(Commands.move(1, { x: 10, y: 10 }));
            game.execute(Commands.removePlayer(1));
            expect(states).toEqual([]);
        });

        it('hands out copies that later ticks do not change', () => {
            game.execute(Commands.join(1, 'alice'));
            const before = game.snapshot();
            game.execute(Commands.move(1, { x: 100, y: 0 }));
            expect(before.players[0].position).toEqual({ x: 0, y: 0 });
        });
    });

    describe('command loop', () => {
        it('applies queued commands in order while running', async () => {
            const sink = recordingSink();
            game.sockets.register(1, sink);

            const firstState = new Promise<StateMessage>((resolve) => {
                const unsubscribe = game.broadcast.subscribe((message) => {
                    if (message.players.length === 0) return;
                    unsubscribe();
                    resolve(message);
                });
            });

            const running = game.start(1);
            await game.enqueue(Commands.join(1, 'alice'));
            await game.enqueue(Commands.move(1, { x: 1000, y: 0 }));

            const state = await firstState;
            expect(state.players[0].id).toBe(1);
            expect(state.players[0].position.x).toBeGreaterThan(0);

            game.stop();
            await running;
            expect(sink.sent).toEqual([{ type: MessageType.JOIN_SUCCESS, id: 1 }]);
        });

        it('refuses to start twice', async () => {
            const running = game.start(50);
            await expect(game.start(50)).rejects.toThrow('already running');
            game.stop();
            await running;
        });

        it('rejects producers once stopped', async () => {
            const running = game.start(50);
            game.stop();
            await running;
            await expect(game.enqueue(Commands.update())).rejects.toThrow('closed');
        });

        it('applies what was already queued before stopping', async () => {
            const running = game.start(50);
            await game.enqueue(Commands.join(1, 'alice'));
            game.stop();

            await expect(running).resolves.toBeUndefined();
            expect(game.getPlayers().map(p => p.name)).toEqual(['alice']);
        });

        it('will not drain by hand while the consumer runs', async () => {
            const running = game.start(50);
            expect(() => game.processPending()).toThrow();
            game.stop();
            await running;
        });
    });
});
