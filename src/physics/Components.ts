import { Vector2 } from "three";

export class TransformComponent {
    constructor(
        public position: Vector2 = new Vector2(0, 0),
        public scale: Vector2 = new Vector2(1, 1),
        public rotation: number = 0
    ) {}
}

export class RigidBodyComponent {
    constructor(
        public velocity: Vector2 = new Vector2(0, 0),
        public acceleration: Vector2 = new Vector2(0, 0),
        public mass: number = 0
    ) {}
}
