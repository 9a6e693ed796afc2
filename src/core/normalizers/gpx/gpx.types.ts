export type GpxWaypoint = {
  latitude?: number;
  longitude?: number;
  name?: string;
  description?: string;
  type?: string;
  time?: Date;
  elevation?: number;
};

export type GpxTrackPoint = {
  latitude: number;
  longitude: number;
  time?: Date;
  elevation?: number;
};

export type GpxDocument = {
  waypoints: GpxWaypoint[];
  trackPoints: GpxTrackPoint[];
};
