// One sample from the timeseries endpoint. The station it belongs to is whichever one was asked for.
export interface TimeseriesEntry {
  dateObserved: string | number;
  temperature?: number | null;
  relativeHumidity?: number | null;
}
