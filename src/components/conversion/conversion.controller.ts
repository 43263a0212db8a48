import * as joi from '@hapi/joi';
import * as logger from '../../utils/logger';
import {config} from '../../config';
import {Source, SourceClient} from '../source/source.client';
import {extractTimeseriesEntries} from '../source/timeseries-payload.service';
import {load} from '../station/feature-loader.service';
import {buildThings} from '../thing/thing.service';
import {buildLocations} from '../location/location.service';
import {buildDatastreams} from '../datastream/datastream.service';
import {buildObservations, buildTimeseriesObservations} from '../observation/observation.service';
import {SnapshotConversion, TimeseriesConversion} from './conversion-result.class';
import {InvalidArgument} from './errors/InvalidArgument';
import {applyFailurePolicy, FailurePolicy} from './failure-policy';


export interface Converter {
  convert(): Promise<SnapshotConversion>;
  convertTimeseries(stationId: string, timeFrom?: string, timeTo?: string): Promise<TimeseriesConversion>;
}

// The latest snapshot is all or nothing, whereas a station's timeseries is best-effort.
export const failurePolicies = {
  convert: 'fail-fast',
  convertTimeseries: 'fail-safe'
} as const satisfies {[K in keyof Converter]: FailurePolicy};


const timeseriesArgsSchema = joi.object({
  stationId: joi.string().trim().required(),
  timeFrom: joi.string().isoDate(),
  timeTo: joi.string().isoDate()
}).required();


export class SensorThingsConverter implements Converter {

  private readonly source: Source;

  public constructor(source: Source = new SourceClient(config.source)) {
    this.source = source;
  }


  //-------------------------------------------------
  // Latest snapshot
  //-------------------------------------------------
  public async convert(): Promise<SnapshotConversion> {

    return applyFailurePolicy('convert', failurePolicies.convert, async () => {

      const raw = await this.source.fetchSnapshot();
      const {rows, crs} = load(raw);
      logger.debug(`Loaded ${rows.length} stations from the latest snapshot`, {crs});

      const converted: SnapshotConversion = {
        Things: buildThings(rows),
        Locations: buildLocations(rows),
        Datastreams: buildDatastreams(rows),
        Observations: buildObservations(rows)
      };
      logger.debug(`Converted snapshot into ${converted.Things.length} things, ${converted.Locations.length} locations, ${converted.Datastreams.length} datastreams and ${converted.Observations.length} observations.`);

      return converted;

    });

  }


  //-------------------------------------------------
  // Timeseries for a single station
  //-------------------------------------------------
  public async convertTimeseries(stationId: string, timeFrom?: string, timeTo?: string): Promise<TimeseriesConversion> {

    // Bad arguments are the caller's fault, so these are thrown regardless of the failure policy.
    // An empty bound, e.g. from '?timeFrom=', just means the range is open on that side.
    const from = blankToUndefined(timeFrom);
    const to = blankToUndefined(timeTo);

    const {error: validationErr, value: validated} = timeseriesArgsSchema.validate({stationId, timeFrom: from, timeTo: to});
    if (validationErr) {
      throw new InvalidArgument(`Invalid timeseries request: ${validationErr.message}`);
    }
    const validStationId: string = validated.stationId;

    return applyFailurePolicy('convertTimeseries', failurePolicies.convertTimeseries, async () => {

      const raw = await this.source.fetchTimeseries(validStationId, from, to);
      const entries = extractTimeseriesEntries(raw);

      if (entries.length === 0) {
        logger.info(`No timeseries data for station ${validStationId}`);
        return emptyTimeseries();
      }

      const observations = buildTimeseriesObservations(validStationId, entries);
      logger.debug(`Converted ${entries.length} timeseries entries for station ${validStationId} into ${observations.length} observations.`);
      return {Observations: observations};

    }, emptyTimeseries);

  }

}


function emptyTimeseries(): TimeseriesConversion {
  return {Observations: []};
}

function blankToUndefined(value?: string): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
