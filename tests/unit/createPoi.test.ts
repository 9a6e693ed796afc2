import { createPoi, InvalidPoiError } from "../../src/core/poi/createPoi";

const base = {
  name: "  Harbour Bench  ",
  position: { latitude: 43.64, longitude: -79.38 },
  source: "manual" as const
};

describe("createPoi", () => {
  it("applies defaults and trims the name", () => {
    const poi = createPoi({ ...base, id: "manual_bench" });

    expect(poi).toMatchObject({
      id: "manual_bench",
      name: "Harbour Bench",
      category: "UNKNOWN",
      notificationRadius: 50,
      priority: 0,
      visited: false,
      isActive: true,
      tags: {}
    });
    expect(poi).not.toHaveProperty("description");
    expect(poi.createdAt).toBeInstanceOf(Date);
  });

  it("generates an id when none is given", () => {
    const a = createPoi(base);
    const b = createPoi(base);
    expect(a.id).not.toBe(b.id);
  });

  it("keeps a non-empty description", () => {
    expect(createPoi({ ...base, description: "by the water" }).description).toBe("by the water");
  });

  it("rejects a blank name", () => {
    expect(() => createPoi({ ...base, name: "   " })).toThrow(new InvalidPoiError("Invalid POI: name is empty"));
  });

  it("rejects coordinates out of range", () => {
    expect(() => createPoi({ ...base, position: { latitude: 91, longitude: 0 } })).toThrow(
      "Invalid POI: coordinates out of range"
    );
  });

  it("rejects non-positive or fractional radii", () => {
    expect(() => createPoi({ ...base, notificationRadius: 0 })).toThrow(InvalidPoiError);
    expect(() => createPoi({ ...base, notificationRadius: 12.5 })).toThrow(InvalidPoiError);
  });

  it("accepts only the known priorities", () => {
    expect(createPoi({ ...base, priority: -1 }).priority).toBe(-1);
    expect(() => createPoi({ ...base, priority: 3 })).toThrow(
      "Invalid POI: priority must be one of -1, 0, 1, 2 (got 3)"
    );
  });
});
