import { TagIndex } from "../src/ecs/TagIndex";

describe("TagIndex", () => {
    const a = { id: 1 };
    const b = { id: 2 };

    test("first assignment wins", () => {
        const tags = new TagIndex();

        expect(tags.tag(a, "player")).toBe(true);
        expect(tags.tag(b, "player")).toBe(false);

        expect(tags.get("player")).toEqual(a);
        expect(tags.has(a, "player")).toBe(true);
        expect(tags.has(b, "player")).toBe(false);
        expect(tags.tagOf(b)).toBeUndefined();
    });

    test("retagging an entity releases its previous tag", () => {
        const tags = new TagIndex();
        tags.tag(a, "player");
        tags.tag(a, "hero");

        expect(tags.tagOf(a)).toBe("hero");
        expect(tags.get("player")).toBeUndefined();
        expect(tags.size).toBe(1);

        expect(tags.tag(b, "player")).toBe(true);
    });

    test("removeEntity and removeTag clear both sides", () => {
        const tags = new TagIndex();
        tags.tag(a, "player");
        tags.tag(b, "boss");

        tags.removeEntity(a);
        tags.removeTag("boss");

        expect(tags.get("player")).toBeUndefined();
        expect(tags.tagOf(a)).toBeUndefined();
        expect(tags.get("boss")).toBeUndefined();
        expect(tags.tagOf(b)).toBeUndefined();
        expect(tags.size).toBe(0);
    });

    test("removing unknown tags or entities is a no-op", () => {
        const tags = new TagIndex();
        tags.tag(a, "player");

        tags.removeTag("nobody");
        tags.removeEntity(b);

        expect(tags.get("player")).toEqual(a);
    });
});
