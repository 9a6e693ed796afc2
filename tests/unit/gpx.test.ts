import { parseGpx } from "../../src/core/normalizers/gpx/parseGpx";
import { normalizeGpx, normalizeWaypoints } from "../../src/core/normalizers/gpx/normalizeWaypoints";

const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

const gpx = (body: string): string =>
  `<?xml version="1.0" encoding="UTF-8"?>\n<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">${body}</gpx>`;

describe("parseGpx", () => {
  it("reads waypoint fields and track points", () => {
    const result = parseGpx(
      gpx(`
        <wpt lat="43.6426" lon="-79.3871">
          <ele>112.5</ele>
          <time>2026-02-10T09:30:00Z</time>
          <name>CN Tower</name>
          <desc>Observation deck</desc>
          <type>Tourist Attraction</type>
        </wpt>
        <trk><trkseg>
          <trkpt lat="43.64" lon="-79.38"><time>2026-02-10T09:00:00Z</time></trkpt>
          <trkpt lat="43.65" lon="-79.39"/>
        </trkseg></trk>
      `)
    );

    expect(result.kind).toBe("parsed");
    if (result.kind !== "parsed") return;

    expect(result.document.waypoints).toEqual([
      {
        latitude: 43.6426,
        longitude: -79.3871,
        name: "CN Tower",
        description: "Observation deck",
        type: "Tourist Attraction",
        time: new Date("2026-02-10T09:30:00Z"),
        elevation: 112.5
      }
    ]);
    expect(result.document.trackPoints).toEqual([
      { latitude: 43.64, longitude: -79.38, time: new Date("2026-02-10T09:00:00Z"), elevation: undefined },
      { latitude: 43.65, longitude: -79.39, time: undefined, elevation: undefined }
    ]);
  });

  it("returns an empty document for an empty gpx element", () => {
    expect(parseGpx("<gpx></gpx>")).toEqual({ kind: "parsed", document: { waypoints: [], trackPoints: [] } });
  });

  it("fails on an empty payload", () => {
    expect(parseGpx("  ")).toEqual({
      kind: "failed",
      failure: { code: "unreadable_payload", message: "GPX document is empty" }
    });
  });

  it("fails on malformed XML", () => {
    const result = parseGpx("<gpx><wpt lat=\"1\" lon=\"2\"></gpx>");
    expect(result.kind).toBe("failed");
    if (result.kind !== "failed") return;
    expect(result.failure.code).toBe("unreadable_payload");
    expect(result.failure.message).toMatch(/^GPX document is not well-formed: /);
  });

  it("fails when the root element is not gpx", () => {
    expect(parseGpx("<kml></kml>")).toEqual({
      kind: "failed",
      failure: { code: "unexpected_shape", message: "GPX document has no <gpx> root element" }
    });
  });
});

describe("normalizeWaypoints", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("names unnamed waypoints by their position in the batch", () => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = normalizeWaypoints(
      [
        { latitude: 1, longitude: 1, name: "First" },
        { latitude: 2, longitude: 2, name: "Second" },
        { latitude: 3, longitude: 3 }
      ],
      { now: () => FIXED_NOW }
    );

    expect(result.kind).toBe("items");
    if (result.kind !== "items") return;
    expect(result.items.map((poi) => poi.name)).toEqual(["First", "Second", "Waypoint 3"]);
    expect(result.items[2]?.createdAt).toEqual(FIXED_NOW);
    expect(result.items.every((poi) => poi.source === "gpx")).toBe(true);
  });

  it("classifies, tags and timestamps waypoints", () => {
    const result = normalizeWaypoints([
      {
        latitude: 43.6426,
        longitude: -79.3871,
        name: "CN Tower",
        type: "Tourist Attraction",
        elevation: 112.5,
        time: new Date("2026-02-10T09:30:00Z")
      }
    ]);

    expect(result.kind).toBe("items");
    if (result.kind !== "items") return;
    expect(result.items[0]).toMatchObject({
      name: "CN Tower",
      category: "TOURIST_ATTRACTION",
      notificationRadius: 50,
      priority: 0,
      createdAt: new Date("2026-02-10T09:30:00Z"),
      tags: { type: "Tourist Attraction", elevation: "112.5" }
    });
  });

  it("skips waypoints without coordinates and logs each skip", () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = normalizeWaypoints([{ name: "Nowhere" }, { latitude: 1, longitude: 2, name: "Somewhere" }, { latitude: 95, longitude: 0 }]);

    expect(result).toMatchObject({ kind: "items", skipped: 2 });
    expect(warnSpy).toHaveBeenCalledTimes(2);
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toEqual({
      event: "normalize.item_skipped",
      source: "gpx",
      index: 0,
      reason: "Invalid POI: waypoint has no coordinates"
    });
    expect(JSON.parse(String(warnSpy.mock.calls[1]?.[0]))).toMatchObject({
      index: 2,
      reason: "Invalid POI: coordinates out of range"
    });
  });

  it("reports empty when every waypoint is skipped", () => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(normalizeWaypoints([{ name: "Nowhere" }])).toEqual({ kind: "empty", skipped: 1 });
  });
});

describe("normalizeGpx", () => {
  it("passes parse failures through", () => {
    expect(normalizeGpx("")).toMatchObject({ kind: "failed", failure: { code: "unreadable_payload" } });
  });

  it("uses the requested source", () => {
    const result = normalizeGpx(gpx(`<wpt lat="10" lon="20"><name>Pin</name></wpt>`), { source: "manual" });
    expect(result.kind).toBe("items");
    if (result.kind !== "items") return;
    expect(result.items[0]?.source).toBe("manual");
  });

  it("returns empty for a document with no waypoints", () => {
    expect(normalizeGpx(gpx(""))).toEqual({ kind: "empty", skipped: 0 });
  });
});
