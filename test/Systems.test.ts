import { Coordinator, EcsError, System } from "../src";
import { Health } from "./Mocks/Health.mock";
import { Position } from "./Mocks/Position.mock";
import { EverythingSystem, MovementSystem, PositionOnlySystem } from "./Mocks/Systems.mock";
import { Velocity } from "./Mocks/Velocity.mock";

describe("Coordinator systems", () => {
    let coordinator: Coordinator;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
        coordinator = new Coordinator();
    });

    afterEach(() => {
        warnSpy.mockRestore();
    });

    it("registers, finds and removes systems by class", () => {
        const movement = coordinator.addSystem(MovementSystem, "moves");

        expect(coordinator.hasSystem(MovementSystem)).toBe(true);
        expect(coordinator.getSystem(MovementSystem)).toBe(movement);
        expect(coordinator.getSystem(MovementSystem).label).toBe("moves");
        expect(coordinator.systems()).toEqual([movement]);

        expect(coordinator.removeSystem(MovementSystem)).toBe(true);
        expect(coordinator.removeSystem(MovementSystem)).toBe(false);
        expect(coordinator.hasSystem(MovementSystem)).toBe(false);
    });

    it("getSystem on an unregistered class fails with SYSTEM_NOT_FOUND", () => {
        expect(() => coordinator.getSystem(PositionOnlySystem)).toThrow(
            expect.objectContaining({ code: "SYSTEM_NOT_FOUND", message: "System PositionOnlySystem is not registered" })
        );
    });

    it("builds the system signature from required components at registration", () => {
        const e = coordinator.create();
        coordinator.addComponent(e, Velocity);

        const movement = coordinator.addSystem(MovementSystem);

        // Velocity already has type 0; Position gets type 1 now
        expect(movement.getSignature()).toBe(0b11);
        expect(movement.getRequiredComponents()).toEqual([Position, Velocity]);
        expect(coordinator.addSystem(EverythingSystem).getSignature()).toBe(0);
    });

    it("requireComponent after registration throws SYSTEM_LOCKED", () => {
        class LateSystem extends System {
            requireLate(): void {
                this.requireComponent(Velocity);
            }
        }
        const late = coordinator.addSystem(LateSystem);

        expect(() => late.requireLate()).toThrow(expect.objectContaining({ code: "SYSTEM_LOCKED" }));
    });

    it("a system that needs more types than the coordinator allows is not registered", () => {
        const small = new Coordinator({ maxComponents: 1 });

        expect(() => small.addSystem(MovementSystem)).toThrow(EcsError);
        expect(small.hasSystem(MovementSystem)).toBe(false);
    });

    it("a rejected system leaves its component types unregistered", () => {
        const small = new Coordinator({ maxComponents: 2 });
        const e = small.create();
        small.addComponent(e, Health);

        expect(() => small.addSystem(MovementSystem)).toThrow(
            expect.objectContaining({ code: "CAPACITY_EXCEEDED", details: { type: "Velocity", capacity: 2 } })
        );
        expect(small.hasSystem(MovementSystem)).toBe(false);
        expect(small.stats().componentTypes).toBe(1);
        expect(() => small.addComponent(e, Velocity, 1, 0)).not.toThrow();
    });

    describe("membership", () => {
        it("created entities join matching systems only after update", () => {
            const movement = coordinator.addSystem(MovementSystem);
            const positions = coordinator.addSystem(PositionOnlySystem);

            const mover = coordinator.create();
            coordinator.addComponent(mover, Position);
            coordinator.addComponent(mover, Velocity);
            const statue = coordinator.create();
            coordinator.addComponent(statue, Position);

            expect(movement.getSystemEntities()).toEqual([]);
            expect(coordinator.isAlive(mover)).toBe(false);
            expect(coordinator.isPending(mover)).toBe(true);

            coordinator.update();

            expect(movement.getSystemEntities()).toEqual([mover]);
            expect(positions.getSystemEntities()).toEqual([mover, statue]);
            expect(coordinator.isAlive(mover)).toBe(true);
            expect(coordinator.isPending(mover)).toBe(false);
        });

        it("a second update with nothing staged neither duplicates nor drops", () => {
            const movement = coordinator.addSystem(MovementSystem);
            const e = coordinator.create();
            coordinator.addComponent(e, Position);
            coordinator.addComponent(e, Velocity);

            coordinator.update();
            coordinator.update();

            expect(movement.getSystemEntities()).toEqual([e]);
            expect(movement.entityCount).toBe(1);
        });

        it("a system with no requirements matches every entity", () => {
            const all = coordinator.addSystem(EverythingSystem);
            const a = coordinator.create();
            const b = coordinator.create();

            coordinator.update();

            expect(all.getSystemEntities()).toEqual([a, b]);
        });

        it("attaching or detaching components on live entities re-matches at the next update", () => {
            const movement = coordinator.addSystem(MovementSystem);
            const e = coordinator.create();
            coordinator.addComponent(e, Position);
            coordinator.update();
            expect(movement.hasEntity(e)).toBe(false);

            coordinator.addComponent(e, Velocity);
            expect(movement.hasEntity(e)).toBe(false);
            coordinator.update();
            expect(movement.hasEntity(e)).toBe(true);

            coordinator.removeComponent(e, Velocity);
            expect(movement.hasEntity(e)).toBe(true);
            coordinator.update();
            expect(movement.hasEntity(e)).toBe(false);
        });

        it("getSystemEntities returns a snapshot", () => {
            const all = coordinator.addSystem(EverythingSystem);
            coordinator.create();
            coordinator.update();

            const list = all.getSystemEntities();
            list.length = 0;

            expect(all.entityCount).toBe(1);
        });
    });

    describe("re-registering a system", () => {
        it("replaces the instance, warns, and re-matches existing live entities", () => {
            const first = coordinator.addSystem(MovementSystem, "first");
            const e = coordinator.create();
            coordinator.addComponent(e, Position);
            coordinator.addComponent(e, Velocity);
            coordinator.update();
            expect(first.getSystemEntities()).toEqual([e]);

            const second = coordinator.addSystem(MovementSystem, "second");

            expect(second).not.toBe(first);
            expect(coordinator.getSystem(MovementSystem)).toBe(second);
            expect(second.getSystemEntities()).toEqual([e]);
            expect(warnSpy).toHaveBeenCalledTimes(1);
            expect(warnSpy).toHaveBeenCalledWith(
                "System MovementSystem was already registered; the previous instance and its entity list are discarded."
            );
        });

        it("does not pick up entities still waiting for update", () => {
            coordinator.addSystem(PositionOnlySystem);
            const e = coordinator.create();
            coordinator.addComponent(e, Position);

            const replaced = coordinator.addSystem(PositionOnlySystem);
            expect(replaced.getSystemEntities()).toEqual([]);

            coordinator.update();
            expect(replaced.getSystemEntities()).toEqual([e]);
        });

        it("a system added after entities exist sees the live ones", () => {
            const e = coordinator.create();
            coordinator.addComponent(e, Position);
            coordinator.update();

            const positions = coordinator.addSystem(PositionOnlySystem);

            expect(positions.getSystemEntities()).toEqual([e]);
            expect(warnSpy).not.toHaveBeenCalled();
        });
    });
});
