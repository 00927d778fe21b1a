import type { Coordinator } from "../ecs/Coordinator";
import { System } from "../ecs/System";
import type { UpdatableSystem } from "../ecs/System";
import { RigidBodyComponent, TransformComponent } from "./Components";

/**
 * Semi-implicit Euler integration: velocity picks up acceleration first,
 * then position moves by the new velocity.
 *
 * Bodies with a positive mass also fall under `gravity` along +y (screen
 * space, y grows downward). Massless bodies only follow their own acceleration.
 */
export class PhysicsSystem extends System implements UpdatableSystem
{
    constructor(public gravity: number = 9.81)
    {
        super();
        this.requireComponent(TransformComponent);
        this.requireComponent(RigidBodyComponent);
    }

    public update(coordinator: Coordinator, dt: number): void
    {
        for (const e of this.getSystemEntities()) {
            const transform = coordinator.getComponent(e, TransformComponent);
            const body = coordinator.getComponent(e, RigidBodyComponent);

            body.velocity.addScaledVector(body.acceleration, dt);
            if (body.mass > 0) body.velocity.y += this.gravity * dt;
            transform.position.addScaledVector(body.velocity, dt);
        }
    }
}
