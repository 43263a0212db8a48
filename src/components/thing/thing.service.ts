import {StationRow} from '../station/station-row.class';
import {Thing} from './thing.class';


export function buildThings(rows: StationRow[]): Thing[] {
  return rows.map(rowToThing);
}


export function rowToThing(row: StationRow): Thing {
  return {
    '@iot.id': row.stationId,
    name: row.name,
    description: 'Sensor station measuring temperature and humidity',
    properties: {
      outdated: row.outdated ?? null,
      measurementsPlausible: row.measurementsPlausible ?? null
    }
  };
}
