import {StationId} from '../station/station-row.class';

export interface Thing {
  '@iot.id': StationId;
  name: string;
  description: string;
  properties: {
    outdated: boolean | null;
    measurementsPlausible: boolean | null;
  };
}
