// A single station from the latest snapshot, flattened from its GeoJSON feature.
export interface StationRow {
  stationId: StationId;
  name: string;
  outdated?: boolean;
  measurementsPlausible?: boolean;
  geometry?: PointGeometry;
  dateObserved?: Date | string | number;
  temperature?: number;
  relativeHumidity?: number;
}

export type StationId = string | number;

export interface PointGeometry {
  x: number;
  y: number;
}
