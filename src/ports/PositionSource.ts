export type PositionFix = {
  latitude: number;
  longitude: number;
  timestampMillis: number;
};
