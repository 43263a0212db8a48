import {Point} from 'geojson';
import {StationId} from '../station/station-row.class';

export interface Location {
  '@iot.id': StationId;
  name: string;
  description: string;
  encodingType: 'application/vnd.geo+json';
  location: Point;
}
