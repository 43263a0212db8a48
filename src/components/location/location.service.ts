import {StationRow} from '../station/station-row.class';
import {Location} from './location.class';


// Rows without a usable point simply don't get a location.
export function buildLocations(rows: StationRow[]): Location[] {

  const locations: Location[] = [];

  rows.forEach((row) => {
    const location = rowToLocation(row);
    if (location) locations.push(location);
  });

  return locations;

}


export function rowToLocation(row: StationRow): Location | undefined {

  if (!row.geometry || !Number.isFinite(row.geometry.x) || !Number.isFinite(row.geometry.y)) {
    return;
  }

  return {
    '@iot.id': row.stationId,
    name: row.name,
    description: 'Geographic location of the sensor',
    encodingType: 'application/vnd.geo+json',
    location: {
      type: 'Point',
      coordinates: [row.geometry.x, row.geometry.y]
    }
  };

}
