import {load, toPointGeometry} from './feature-loader.service';
import {ParseError} from '../source/errors/ParseError';
import * as logger from '../../utils/logger';


const snapshot = {
  type: 'FeatureCollection',
  crs: {type: 'name', properties: {name: 'urn:ogc:def:crs:OGC:1.3:CRS84'}},
  features: [
    {
      type: 'Feature',
      properties: {
        stationId: '11117',
        name: 'Bahnhofplatz',
        outdated: false,
        measurementsPlausible: true,
        dateObserved: '2024-11-01T00:00:00',
        temperature: 21.5,
        relativeHumidity: 60
      },
      geometry: {type: 'Point', coordinates: [7.4391, 46.9488]}
    },
    {
      type: 'Feature',
      properties: {
        stationId: 11118,
        name: 'Rosengarten',
        outdated: true,
        measurementsPlausible: false,
        dateObserved: '2024-11-01T00:10:00',
        temperature: null,
        relativeHumidity: 'n/a'
      },
      geometry: null
    }
  ]
};


describe('Testing of FeatureLoader load function', () => {

  beforeAll(() => {
    logger.configure({level: 'silent'});
  });

  test('Flattens features into station rows', () => {
    const table = load(JSON.stringify(snapshot));
    expect(table.crs).toBe('urn:ogc:def:crs:OGC:1.3:CRS84');
    expect(table.rows).toEqual([
      {
        stationId: '11117',
        name: 'Bahnhofplatz',
        outdated: false,
        measurementsPlausible: true,
        geometry: {x: 7.4391, y: 46.9488},
        dateObserved: '2024-11-01T00:00:00',
        temperature: 21.5,
        relativeHumidity: 60
      },
      {
        stationId: 11118,
        name: 'Rosengarten',
        outdated: true,
        measurementsPlausible: false,
        dateObserved: '2024-11-01T00:10:00'
      }
    ]);
  });

  test('Keeps rows without geometry', () => {
    const table = load(JSON.stringify(snapshot));
    expect(table.rows.length).toBe(2);
    expect(table.rows[1]).not.toHaveProperty('geometry');
  });

  test('Leaves crs undefined when the collection has none', () => {
    const table = load(JSON.stringify({type: 'FeatureCollection', features: []}));
    expect(table).toEqual({rows: []});
  });

  test('Skips features without a stationId', () => {
    const table = load(JSON.stringify({
      type: 'FeatureCollection',
      features: [
        {type: 'Feature', properties: {name: 'Nameless'}, geometry: {type: 'Point', coordinates: [7.4, 46.9]}},
        {type: 'Feature', properties: null, geometry: null}
      ]
    }));
    expect(table.rows).toEqual([]);
  });

  test('Defaults a missing name to an empty string', () => {
    const table = load(JSON.stringify({
      type: 'FeatureCollection',
      features: [{type: 'Feature', properties: {stationId: 'abc'}, geometry: null}]
    }));
    expect(table.rows).toEqual([{stationId: 'abc', name: ''}]);
  });

  test('Throws a ParseError for invalid JSON', () => {
    expect(() => {
      load('{"type": "FeatureCollection",');
    }).toThrowError(ParseError);
  });

  test('Throws a ParseError when it is not a feature collection', () => {
    expect(() => {
      load(JSON.stringify({type: 'Feature', properties: {}}));
    }).toThrowError(ParseError);
  });

});


describe('Testing of toPointGeometry function', () => {

  test('Converts a GeoJSON point', () => {
    expect(toPointGeometry({type: 'Point', coordinates: [7.44, 46.95]})).toEqual({x: 7.44, y: 46.95});
  });

  test('Ignores other geometry types', () => {
    expect(toPointGeometry({type: 'LineString', coordinates: [[7.44, 46.95], [7.45, 46.96]]})).toBeUndefined();
  });

  test('Ignores points with too few coordinates', () => {
    expect(toPointGeometry({type: 'Point', coordinates: [7.44]})).toBeUndefined();
  });

  test('Ignores null', () => {
    expect(toPointGeometry(null)).toBeUndefined();
  });

});
