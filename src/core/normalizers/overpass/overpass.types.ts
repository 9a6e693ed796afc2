export type OverpassElementType = "node" | "way" | "relation";

export type OverpassElement = {
  type: OverpassElementType;
  id: number;
  lat?: number;
  lon?: number;
  center?: { lat: number; lon: number };
  tags?: Record<string, string>;
};

export type OverpassResponse = {
  version?: number;
  generator?: string;
  elements: unknown[];
};
