import { PoiRegistry } from "../../src/core/registry/PoiRegistry";
import { makePoi } from "../support/fakes";

describe("PoiRegistry", () => {
  it("upserts by id", async () => {
    const registry = new PoiRegistry();

    await registry.upsertMany([makePoi({ id: "a", name: "Old" }), makePoi({ id: "b" })]);
    await registry.upsertMany([makePoi({ id: "a", name: "New" })]);

    expect(registry.all()).toHaveLength(2);
    expect(registry.get("a")?.name).toBe("New");
  });

  it("replaces one source without touching the others", async () => {
    const registry = new PoiRegistry([
      makePoi({ id: "o1", source: "overpass" }),
      makePoi({ id: "o2", source: "overpass" }),
      makePoi({ id: "m1", source: "manual" })
    ]);

    const result = await registry.replaceSource("overpass", [makePoi({ id: "o3", source: "overpass" })]);

    expect(result).toEqual({ removed: 2, stored: 1 });
    expect(registry.all().map((poi) => poi.id).sort()).toEqual(["m1", "o3"]);
  });

  it("removes a source", async () => {
    const registry = new PoiRegistry([makePoi({ id: "g1", source: "gpx" }), makePoi({ id: "m1" })]);
    await expect(registry.removeSource("gpx")).resolves.toBe(1);
    expect(registry.get("g1")).toBeUndefined();
  });

  it("tracks visited and notification state", async () => {
    const registry = new PoiRegistry([makePoi({ id: "a" }), makePoi({ id: "b", isActive: false })]);

    await expect(registry.markVisited("a")).resolves.toBe(true);
    await expect(registry.markVisited("missing")).resolves.toBe(false);
    await expect(registry.recordNotified("a", 2000)).resolves.toBe(true);
    await expect(registry.recordNotified("a", 1000)).resolves.toBe(false);

    expect(registry.get("a")).toMatchObject({ visited: true, lastNotifiedAtMillis: 2000 });
    expect(registry.stats()).toEqual({ total: 2, active: 1, visited: 1 });
    expect(registry.active().map((poi) => poi.id)).toEqual(["a"]);

    await registry.clearSurveyState();
    expect(registry.get("a")?.visited).toBe(false);
    expect(registry.get("a")).not.toHaveProperty("lastNotifiedAtMillis");
  });

  it("serializes concurrent writes", async () => {
    const registry = new PoiRegistry();
    const batches = Array.from({ length: 20 }, (_, i) => [makePoi({ id: `p${i}` })]);

    await Promise.all(batches.map((batch) => registry.upsertMany(batch)));

    expect(registry.stats().total).toBe(20);
  });
});
