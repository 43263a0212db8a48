import {cloneDeep} from 'lodash';
import {StationId, StationRow} from '../station/station-row.class';
import {Datastream, DatastreamKind, ObservedProperty, Sensor, UnitOfMeasurement} from './datastream.class';


const measurementObservationType = 'http://www.opengis.net/def/observationType/OGC-OM/2.0/OM_Measurement';

interface DatastreamTemplate {
  label: string;
  description: string;
  unitOfMeasurement: UnitOfMeasurement;
  observedProperty: ObservedProperty;
  sensor: Sensor;
}

const templates: {[K in DatastreamKind]: DatastreamTemplate} = {
  temperature: {
    label: 'Temperature',
    description: 'Temperature measurements',
    unitOfMeasurement: {symbol: '°C', name: 'Degree Celsius', definition: 'http://unitsofmeasure.org/ucum.html#para-30'},
    observedProperty: {name: 'Temperature', definition: 'http://sensorthings.org/Temperature'},
    sensor: {name: 'Temperature Sensor', description: 'Measures air temperature'}
  },
  humidity: {
    label: 'Humidity',
    description: 'Humidity measurements',
    unitOfMeasurement: {symbol: '%', name: 'Percentage', definition: 'http://unitsofmeasure.org/ucum.html#para-30'},
    observedProperty: {name: 'Humidity', definition: 'http://sensorthings.org/Humidity'},
    sensor: {name: 'Humidity Sensor', description: 'Measures relative humidity'}
  }
};

export const datastreamKinds: DatastreamKind[] = ['temperature', 'humidity'];


export function datastreamId(stationId: StationId, kind: DatastreamKind): string {
  return `${stationId}-${kind}`;
}


// Always two per station, whether or not the station currently has readings for both.
export function buildDatastreams(rows: StationRow[]): Datastream[] {
  const datastreams: Datastream[] = [];
  rows.forEach((row) => {
    datastreamKinds.forEach((kind) => {
      datastreams.push(buildDatastream(row, kind));
    });
  });
  return datastreams;
}


export function buildDatastream(row: StationRow, kind: DatastreamKind): Datastream {
  const template = templates[kind];
  return {
    '@iot.id': datastreamId(row.stationId, kind),
    name: `${template.label} Datastream for ${row.name}`,
    description: template.description,
    // Cloned so that no two datastreams share nested objects.
    unitOfMeasurement: cloneDeep(template.unitOfMeasurement),
    observationType: measurementObservationType,
    Thing: {'@iot.id': row.stationId},
    ObservedProperty: cloneDeep(template.observedProperty),
    Sensor: cloneDeep(template.sensor)
  };
}
