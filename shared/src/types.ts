export interface Vector2 {
    x: number;
    y: number;
}

export interface PlayerState {
    id: number;
    position: Vector2;
    radius: number;
    name: string;
}

export interface FoodState {
    position: Vector2;
    radius: number;
}
