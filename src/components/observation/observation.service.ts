import * as logger from '../../utils/logger';
import {normaliseSnapshotTimestamp, normaliseTimeseriesTimestamp} from '../../utils/timestamps';
import {datastreamId} from '../datastream/datastream.service';
import {DatastreamKind} from '../datastream/datastream.class';
import {StationId, StationRow} from '../station/station-row.class';
import {TimeseriesEntry} from '../source/timeseries-entry.class';
import {InvalidTimestamp} from './errors/InvalidTimestamp';
import {Observation} from './observation.class';


interface Reading {
  kind: DatastreamKind;
  value?: number | null;
}


//-------------------------------------------------
// Snapshot
//-------------------------------------------------
// A missing reading gives no observation, same as for timeseries entries.
export function buildObservations(rows: StationRow[]): Observation[] {

  const observations: Observation[] = [];

  rows.forEach((row) => {
    if (row.dateObserved === undefined) return;
    const time = normaliseSnapshotTimestamp(row.dateObserved);
    const readings: Reading[] = [
      {kind: 'temperature', value: row.temperature},
      {kind: 'humidity', value: row.relativeHumidity}
    ];
    observations.push(...readingsToObservations(row.stationId, time, readings));
  });

  return observations;

}


//-------------------------------------------------
// Timeseries
//-------------------------------------------------
export function buildTimeseriesObservations(stationId: StationId, entries: TimeseriesEntry[]): Observation[] {

  const observations: Observation[] = [];

  entries.forEach((entry, idx) => {

    let time: string;
    try {
      time = normaliseTimeseriesTimestamp(entry.dateObserved);
    } catch (err) {
      if (err instanceof InvalidTimestamp) {
        logger.warn(`Skipping timeseries entry ${idx} for station ${stationId}: ${err.message}`);
        return;
      }
      throw err;
    }

    const readings: Reading[] = [
      {kind: 'temperature', value: entry.temperature},
      {kind: 'humidity', value: entry.relativeHumidity}
    ];
    observations.push(...readingsToObservations(stationId, time, readings));

  });

  return observations;

}


function readingsToObservations(stationId: StationId, time: string, readings: Reading[]): Observation[] {

  const observations: Observation[] = [];

  readings.forEach((reading) => {
    if (typeof reading.value !== 'number' || !Number.isFinite(reading.value)) return;
    observations.push({
      Datastream: {'@iot.id': datastreamId(stationId, reading.kind)},
      phenomenonTime: time,
      resultTime: time,
      result: reading.value
    });
  });

  return observations;

}
