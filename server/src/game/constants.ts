export const WORLD_WIDTH = 800;
export const WORLD_HEIGHT = 600;

export const FOOD_FLOOR = 50;
export const FOOD_MIN_RADIUS = 2;
export const FOOD_MAX_RADIUS = 6;

export const PLAYER_START_RADIUS = 10;
export const DEAD_RADIUS = 0.01;
export const SPEED_FACTOR = 100;

export const DEFAULT_TICK_MS = 10;
export const DEFAULT_QUEUE_CAPACITY = 100;
