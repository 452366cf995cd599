import type { PlayerState, Vector2 } from 'shared';
import { Vector2D } from './Vector2D.js';
import { PLAYER_START_RADIUS, SPEED_FACTOR } from './constants.js';

export function mass(radius: number): number {
    return 2 * Math.PI * radius * radius;
}

/**
 * Radius of the body left after one body absorbs another.
 * Mass is conserved: mass(result) === mass(r1) + mass(r2).
 */
export function radiusAfterEat(r1: number, r2: number): number {
    return Math.sqrt((mass(r1) + mass(r2)) / (2 * Math.PI));
}

export class Player {
    public id: number;
    public name: string;
    public position: Vector2D = Vector2D.zero();
    public radius: number = PLAYER_START_RADIUS;

    constructor(id: number, name: string) {
        this.id = id;
        this.name = name;
    }

    mass(): number {
        return mass(this.radius);
    }

    // Heavier players are slower: speed falls with sqrt(mass), not radius
    speed(): number {
        return SPEED_FACTOR / Math.sqrt(this.mass());
    }

    moveTowards(target: Vector2) {
        const velocity = this.speed();
        const difference = Vector2D.from(target).sub(this.position);

        // Arrived: wait for the next input instead of overshooting
        if (difference.magnitude() < velocity) return;

        this.position = this.position.add(difference.normalize().scale(velocity));
    }

    toState(): PlayerState {
        return {
            id: this.id,
            name: this.name,
            position: this.position.toJSON(),
            radius: this.radius
        };
    }
}
