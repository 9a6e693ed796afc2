export type GeoJsonFeatureCollection = {
  type?: string;
  // features are validated one by one during normalization
  features: unknown[];
};
