import {StationRow} from './station-row.class';

export interface FeatureTable {
  // e.g. 'urn:ogc:def:crs:OGC:1.3:CRS84'
  crs?: string;
  rows: StationRow[];
}
