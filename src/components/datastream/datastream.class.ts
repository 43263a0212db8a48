import {StationId} from '../station/station-row.class';

export type DatastreamKind = 'temperature' | 'humidity';

export interface Datastream {
  '@iot.id': string;
  name: string;
  description: string;
  unitOfMeasurement: UnitOfMeasurement;
  observationType: string;
  Thing: {'@iot.id': StationId};
  ObservedProperty: ObservedProperty;
  Sensor: Sensor;
}

export interface UnitOfMeasurement {
  symbol: string;
  name: string;
  definition: string;
}

export interface ObservedProperty {
  name: string;
  definition: string;
}

export interface Sensor {
  name: string;
  description: string;
}
