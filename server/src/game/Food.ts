import type { FoodState } from 'shared';
import { Vector2D } from './Vector2D.js';
import { FOOD_MAX_RADIUS, FOOD_MIN_RADIUS, WORLD_HEIGHT, WORLD_WIDTH } from './constants.js';

/** Returns a number in [0, 1), like Math.random. */
export type RandomSource = () => number;

function randomRange(random: RandomSource, min: number, max: number): number {
    return min + random() * (max - min);
}

export class Food {
    public position: Vector2D;
    public radius: number;

    constructor(position: Vector2D, radius: number) {
        this.position = position;
        this.radius = radius;
    }

    // Placed inside the arena, inset by its own radius
    static random(random: RandomSource = Math.random): Food {
        const radius = randomRange(random, FOOD_MIN_RADIUS, FOOD_MAX_RADIUS);
        const x = randomRange(random, radius, WORLD_WIDTH - radius);
        const y = randomRange(random, radius, WORLD_HEIGHT - radius);
        return new Food(new Vector2D(x, y), radius);
    }

    static generate(amount: number, random: RandomSource = Math.random): Food[] {
        const food: Food[] = [];
        for (let i = 0; i < amount; i++) {
            food.push(Food.random(random));
        }
        return food;
    }

    toState(): FoodState {
        return {
            position: this.position.toJSON(),
            radius: this.radius
        };
    }
}
