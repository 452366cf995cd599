import type { Vector2 } from 'shared';

export class Vector2D implements Vector2 {
    public readonly x: number;
    public readonly y: number;

    constructor(x: number, y: number) {
        this.x = x;
        this.y = y;
    }

    static zero(): Vector2D {
        return new Vector2D(0, 0);
    }

    static from(v: Vector2): Vector2D {
        return new Vector2D(v.x, v.y);
    }

    add(other: Vector2): Vector2D {
        return new Vector2D(this.x + other.x, this.y + other.y);
    }

    sub(other: Vector2): Vector2D {
        return new Vector2D(this.x - other.x, this.y - other.y);
    }

    scale(by: number): Vector2D {
        return new Vector2D(this.x * by, this.y * by);
    }

    magnitude(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y);
    }

    // Zero stays zero so a player at rest has no direction
    normalize(): Vector2D {
        const magnitude = this.magnitude();
        if (magnitude === 0) {
            return Vector2D.zero();
        }
        return new Vector2D(this.x / magnitude, this.y / magnitude);
    }

    toJSON(): Vector2 {
        return { x: this.x, y: this.y };
    }
}
