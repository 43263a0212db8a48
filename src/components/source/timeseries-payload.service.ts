import * as joi from '@hapi/joi';
import * as logger from '../../utils/logger';
import {isFiniteNumber} from '../../utils/numbers';
import {TimeseriesEntry} from './timeseries-entry.class';


const timeseriesEntrySchema = joi.object({
  dateObserved: joi.alternatives().try(
    joi.string(),
    joi.number()
  ).required()
}).unknown()
  .required()
  .options({convert: false});

const readingKeys: ('temperature' | 'relativeHumidity')[] = ['temperature', 'relativeHumidity'];


// The endpoint has been seen returning both a bare array and an object with a values array.
export function extractTimeseriesEntries(payload: unknown): TimeseriesEntry[] {

  let candidates: unknown[] = [];

  if (Array.isArray(payload)) {
    candidates = payload;
  } else if (typeof payload === 'object' && payload !== null && hasValuesArray(payload)) {
    candidates = payload.values;
  }

  const entries: TimeseriesEntry[] = [];

  candidates.forEach((candidate, idx) => {
    const {error: validationErr, value: entry} = timeseriesEntrySchema.validate(candidate);
    if (validationErr) {
      logger.warn(`Ignoring invalid timeseries entry at index ${idx}. Reason: ${validationErr.message}`);
      return;
    }
    entries.push(toEntry(entry, idx));
  });

  return entries;

}


// A bad reading only costs us that reading, not the rest of the entry.
function toEntry(candidate: {[key: string]: unknown; dateObserved: string | number}, idx: number): TimeseriesEntry {

  const entry: TimeseriesEntry = {dateObserved: candidate.dateObserved};

  readingKeys.forEach((key) => {
    const value = candidate[key];
    if (isFiniteNumber(value)) {
      entry[key] = value;
    } else if (value !== undefined && value !== null) {
      logger.warn(`Ignoring non-numeric ${key} in timeseries entry at index ${idx}.`);
    }
  });

  return entry;

}


function hasValuesArray(payload: object): payload is {values: unknown[]} {
  return 'values' in payload && Array.isArray(payload.values);
}
