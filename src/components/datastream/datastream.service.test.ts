import {buildDatastreams, datastreamId} from './datastream.service';
import {StationRow} from '../station/station-row.class';


describe('Testing of buildDatastreams function', () => {

  test('Builds a temperature and a humidity datastream for a station', () => {
    const rows: StationRow[] = [{stationId: '11117', name: 'Bahnhofplatz'}];
    const expected = [
      {
        '@iot.id': '11117-temperature',
        name: 'Temperature Datastream for Bahnhofplatz',
        description: 'Temperature measurements',
        unitOfMeasurement: {symbol: '°C', name: 'Degree Celsius', definition: 'http://unitsofmeasure.org/ucum.html#para-30'},
        observationType: 'http://www.opengis.net/def/observationType/OGC-OM/2.0/OM_Measurement',
        Thing: {'@iot.id': '11117'},
        ObservedProperty: {name: 'Temperature', definition: 'http://sensorthings.org/Temperature'},
        Sensor: {name: 'Temperature Sensor', description: 'Measures air temperature'}
      },
      {
        '@iot.id': '11117-humidity',
        name: 'Humidity Datastream for Bahnhofplatz',
        description: 'Humidity measurements',
        unitOfMeasurement: {symbol: '%', name: 'Percentage', definition: 'http://unitsofmeasure.org/ucum.html#para-30'},
        observationType: 'http://www.opengis.net/def/observationType/OGC-OM/2.0/OM_Measurement',
        Thing: {'@iot.id': '11117'},
        ObservedProperty: {name: 'Humidity', definition: 'http://sensorthings.org/Humidity'},
        Sensor: {name: 'Humidity Sensor', description: 'Measures relative humidity'}
      }
    ];
    expect(buildDatastreams(rows)).toEqual(expected);
  });

  test('Always gives two datastreams per row, even without readings', () => {
    const rows: StationRow[] = [
      {stationId: '1', name: 'A', temperature: 20.1},
      {stationId: '2', name: 'B'},
      {stationId: 3, name: 'C', relativeHumidity: 55}
    ];
    const ids = buildDatastreams(rows).map((d) => d['@iot.id']);
    expect(ids).toEqual(['1-temperature', '1-humidity', '2-temperature', '2-humidity', '3-temperature', '3-humidity']);
  });

  test('Datastreams do not share nested objects', () => {
    const [first, , second] = buildDatastreams([{stationId: '1', name: 'A'}, {stationId: '2', name: 'B'}]);
    expect(first.ObservedProperty).toEqual(second.ObservedProperty);
    expect(first.ObservedProperty).not.toBe(second.ObservedProperty);
  });

});


describe('Testing of datastreamId function', () => {

  test('Joins the station id and the kind', () => {
    expect(datastreamId(11117, 'humidity')).toBe('11117-humidity');
  });

});
