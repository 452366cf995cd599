import type { FoodState, PlayerState, Vector2 } from './types.js';

export enum MessageType {
    JOIN = 'join',
    MOVE = 'move',
    JOIN_SUCCESS = 'join_success',
    PLAYER_EATEN = 'player_eaten',
    STATE = 'state'
}

// Client -> Server
export interface JoinMessage {
    type: MessageType.JOIN;
    name: string;
}

export interface MoveMessage {
    type: MessageType.MOVE;
    position: Vector2;
}

// Server -> single client
export interface JoinSuccessMessage {
    type: MessageType.JOIN_SUCCESS;
    id: number;
}

export interface PlayerEatenMessage {
    type: MessageType.PLAYER_EATEN;
    id: number;
}

// Server -> all clients
export interface StateMessage {
    type: MessageType.STATE;
    players: PlayerState[];
    food: FoodState[];
}

export type ClientMessage = JoinMessage | MoveMessage;
export type PlayerNotification = JoinSuccessMessage | PlayerEatenMessage;
export type ServerMessage = PlayerNotification | StateMessage;
