import { PendingChanges } from "../src/ecs/PendingChanges";

describe("PendingChanges", () => {
    test("drains staged entities in ascending id order and clears", () => {
        const pending = new PendingChanges();
        pending.create({ id: 3 });
        pending.create({ id: 1 });
        pending.refresh({ id: 7 });
        pending.destroy({ id: 5 });
        pending.destroy({ id: 2 });

        expect(pending.drain()).toEqual({
            create: [{ id: 1 }, { id: 3 }],
            refresh: [{ id: 7 }],
            destroy: [{ id: 2 }, { id: 5 }]
        });
        expect(pending.isEmpty()).toBe(true);
        expect(pending.drain()).toEqual({ create: [], refresh: [], destroy: [] });
    });

    test("staging the same entity twice keeps one entry", () => {
        const pending = new PendingChanges();
        pending.destroy({ id: 4 });
        pending.destroy({ id: 4 });

        expect(pending.counts).toEqual({ create: 0, refresh: 0, destroy: 1 });
    });

    test("isCreating / isDestroying reflect the staged sets", () => {
        const pending = new PendingChanges();
        pending.create({ id: 1 });

        expect(pending.isCreating({ id: 1 })).toBe(true);
        expect(pending.isDestroying({ id: 1 })).toBe(false);

        pending.drain();
        expect(pending.isCreating({ id: 1 })).toBe(false);
    });
});
