import { XMLParser, XMLValidator } from "fast-xml-parser";
import { toErrorMessage, type SourceFailure } from "../../source/sourceResult";
import { isRecord, optionalNumber, optionalString } from "../skip";
import type { GpxDocument, GpxTrackPoint, GpxWaypoint } from "./gpx.types";

const REPEATED_TAGS = new Set(["wpt", "trk", "trkseg", "trkpt"]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => REPEATED_TAGS.has(tagName)
});

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

// Elements that carry attributes come back as { "#text": ... }.
const textOf = (value: unknown): string | undefined => {
  if (isRecord(value)) return optionalString(value["#text"]);
  return optionalString(value);
};

const parseTime = (value: unknown): Date | undefined => {
  const text = textOf(value);
  if (text == null) return undefined;
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

const toWaypoint = (node: unknown): GpxWaypoint => {
  if (!isRecord(node)) return {};
  const waypoint: GpxWaypoint = {
    latitude: optionalNumber(node["@_lat"]),
    longitude: optionalNumber(node["@_lon"]),
    name: textOf(node.name),
    description: textOf(node.desc),
    type: textOf(node.type),
    time: parseTime(node.time),
    elevation: optionalNumber(textOf(node.ele))
  };
  return waypoint;
};

const toTrackPoints = (tracks: unknown[]): GpxTrackPoint[] =>
  tracks.flatMap((track) =>
    asArray(isRecord(track) ? track.trkseg : undefined).flatMap((segment) =>
      asArray(isRecord(segment) ? segment.trkpt : undefined).flatMap((node): GpxTrackPoint[] => {
        if (!isRecord(node)) return [];
        const latitude = optionalNumber(node["@_lat"]);
        const longitude = optionalNumber(node["@_lon"]);
        if (latitude == null || longitude == null) return [];
        return [
          {
            latitude,
            longitude,
            time: parseTime(node.time),
            elevation: optionalNumber(textOf(node.ele))
          }
        ];
      })
    )
  );

export type GpxParseResult =
  | { kind: "parsed"; document: GpxDocument }
  | { kind: "failed"; failure: SourceFailure };

const unreadable = (message: string, cause?: unknown): GpxParseResult => {
  const failure: SourceFailure = { code: "unreadable_payload", message };
  if (cause !== undefined) failure.cause = cause;
  return { kind: "failed", failure };
};

/**
 * Structural GPX parse: collects `<wpt>` records (coordinates may be missing)
 * and the `<trkpt>` points of every track segment.
 */
export const parseGpx = (xml: string): GpxParseResult => {
  if (xml.trim() === "") {
    return unreadable("GPX document is empty");
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return unreadable(`GPX document is not well-formed: ${validation.err.msg}`);
  }

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml);
  } catch (err) {
    return unreadable(`GPX document could not be parsed: ${toErrorMessage(err)}`, err);
  }

  const root = isRecord(parsed) ? parsed.gpx : undefined;
  if (root === undefined) {
    return {
      kind: "failed",
      failure: { code: "unexpected_shape", message: "GPX document has no <gpx> root element" }
    };
  }

  // An empty <gpx></gpx> parses to "" rather than an object.
  const gpx = isRecord(root) ? root : {};
  const document: GpxDocument = {
    waypoints: asArray(gpx.wpt).map(toWaypoint),
    trackPoints: toTrackPoints(asArray(gpx.trk))
  };
  return { kind: "parsed", document };
};
