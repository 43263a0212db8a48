import * as joi from '@hapi/joi';
import {Feature, FeatureCollection, Geometry, GeoJsonProperties} from 'geojson';
import * as logger from '../../utils/logger';
import {isFiniteNumber} from '../../utils/numbers';
import {ParseError} from '../source/errors/ParseError';
import {FeatureTable} from './feature-table.class';
import {PointGeometry, StationId, StationRow} from './station-row.class';


// Only the outer structure is checked here, individual features are allowed to be incomplete.
const featureCollectionSchema = joi.object({
  type: joi.string().valid('FeatureCollection').required(),
  crs: joi.object({
    properties: joi.object({
      name: joi.string()
    }).unknown()
  }).unknown(),
  features: joi.array().items(
    joi.object({
      type: joi.string().valid('Feature'),
      properties: joi.object().unknown().allow(null),
      geometry: joi.object().unknown().allow(null)
    }).unknown()
  ).required()
}).unknown()
  .required();


export function load(geojson: string): FeatureTable {

  let parsed: unknown;
  try {
    parsed = JSON.parse(geojson);
  } catch (err) {
    throw new ParseError('The latest snapshot is not valid JSON.', err instanceof Error ? err.message : undefined);
  }

  const {error: validationErr, value: collection} = featureCollectionSchema.validate(parsed);
  if (validationErr) {
    throw new ParseError(`The latest snapshot is not a valid feature collection. Reason: ${validationErr.message}`);
  }

  return featureCollectionToTable(collection);

}


export function featureCollectionToTable(collection: FeatureCollection & {crs?: {properties?: {name?: string}}}): FeatureTable {

  const rows: StationRow[] = [];

  collection.features.forEach((feature, idx) => {
    const row = featureToRow(feature);
    if (row) {
      rows.push(row);
    } else {
      logger.warn(`Feature at index ${idx} has no stationId and will be ignored.`);
    }
  });

  const table: FeatureTable = {rows};
  const crs = collection.crs?.properties?.name;
  if (typeof crs === 'string' && crs !== '') {
    table.crs = crs;
  }

  return table;

}


export function featureToRow(feature: Feature<Geometry | null, GeoJsonProperties>): StationRow | undefined {

  const props = feature.properties || {};

  const stationId = toStationId(props.stationId);
  if (stationId === undefined) return;

  const row: StationRow = {
    stationId,
    name: typeof props.name === 'string' ? props.name : ''
  };

  if (typeof props.outdated === 'boolean') row.outdated = props.outdated;
  if (typeof props.measurementsPlausible === 'boolean') row.measurementsPlausible = props.measurementsPlausible;

  const geometry = toPointGeometry(feature.geometry);
  if (geometry) row.geometry = geometry;

  if (typeof props.dateObserved === 'string' || typeof props.dateObserved === 'number') {
    row.dateObserved = props.dateObserved;
  }

  if (isFiniteNumber(props.temperature)) row.temperature = props.temperature;
  if (isFiniteNumber(props.relativeHumidity)) row.relativeHumidity = props.relativeHumidity;

  return row;

}


export function toPointGeometry(geometry: Geometry | null): PointGeometry | undefined {

  if (!geometry || geometry.type !== 'Point' || !Array.isArray(geometry.coordinates)) return;

  const [x, y] = geometry.coordinates;
  if (!isFiniteNumber(x) || !isFiniteNumber(y)) return;

  return {x, y};

}


function toStationId(value: unknown): StationId | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (isFiniteNumber(value)) return value;
  return;
}

