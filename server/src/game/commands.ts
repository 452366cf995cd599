import type { Vector2 } from 'shared';

// Intents sent by a connected client, tagged with its player id
export type PlayerCommand =
    | { kind: 'join'; id: number; name: string }
    | { kind: 'move'; id: number; position: Vector2 };

// Issued by the manager itself: the tick timer, join handling and reaping
export type InternalCommand =
    | { kind: 'update' }
    | { kind: 'add_player'; id: number; name: string }
    | { kind: 'remove_player'; id: number };

export type Command = PlayerCommand | InternalCommand;

export const Commands = {
    join: (id: number, name: string): PlayerCommand => ({ kind: 'join', id, name }),
    move: (id: number, position: Vector2): PlayerCommand => ({ kind: 'move', id, position }),
    update: (): InternalCommand => ({ kind: 'update' }),
    addPlayer: (id: number, name: string): InternalCommand => ({ kind: 'add_player', id, name }),
    removePlayer: (id: number): InternalCommand => ({ kind: 'remove_player', id })
};
