import type { Coordinator } from "./Coordinator";
import { EcsError, formatCtor } from "./Errors";
import { isUpdatable } from "./System";
import type { System, SystemCtor } from "./System";

/**
 * Runs registered systems by phase. Each {@link run} is one simulation step:
 * the coordinator reconciles staged entities first, then every scheduled
 * system updates in phase order, then insertion order within a phase.
 */
export class Schedule {
    private readonly phases = new Map<string, SystemCtor[]>();

    add<S extends System>(phase: string, ctor: SystemCtor<S>): this {
        const list = this.phases.get(phase) ?? [];
        list.push(ctor);
        this.phases.set(phase, list);
        return this;
    }

    run(coordinator: Coordinator, dt: number, phaseOrder: string[]): void {
        coordinator.update();

        for (const phase of phaseOrder) {
            const list = this.phases.get(phase);
            if (!list) continue;
            for (const ctor of list) {
                const system = coordinator.getSystem(ctor);
                if (!isUpdatable(system)) throw EcsError.systemNotUpdatable(formatCtor(ctor));
                system.update(coordinator, dt);
            }
        }
    }
}
