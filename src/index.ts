//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import {config} from './config';
import * as logger from './utils/logger';


//-------------------------------------------------
// Logging
//-------------------------------------------------
logger.configure(config.logger);


//-------------------------------------------------
// Exports
//-------------------------------------------------
export {config};
export {SensorThingsConverter, Converter, failurePolicies} from './components/conversion/conversion.controller';
export {applyFailurePolicy, FailurePolicy} from './components/conversion/failure-policy';
export {SnapshotConversion, TimeseriesConversion} from './components/conversion/conversion-result.class';
export {SourceClient, Source, SourceClientOptions} from './components/source/source.client';
export {extractTimeseriesEntries} from './components/source/timeseries-payload.service';
export {TimeseriesEntry} from './components/source/timeseries-entry.class';
export {load} from './components/station/feature-loader.service';
export {StationRow, StationId, PointGeometry} from './components/station/station-row.class';
export {FeatureTable} from './components/station/feature-table.class';
export {buildThings} from './components/thing/thing.service';
export {buildLocations} from './components/location/location.service';
export {buildDatastreams, datastreamId} from './components/datastream/datastream.service';
export {buildObservations, buildTimeseriesObservations} from './components/observation/observation.service';
export {Thing} from './components/thing/thing.class';
export {Location} from './components/location/location.class';
export {Datastream, DatastreamKind} from './components/datastream/datastream.class';
export {Observation} from './components/observation/observation.class';
export {OperationalError} from './errors/OperationalError';
export {BadRequest} from './errors/BadRequest';
export {UnexpectedError} from './errors/UnexpectedError';
export {TransportError} from './components/source/errors/TransportError';
export {ParseError} from './components/source/errors/ParseError';
export {InvalidArgument} from './components/conversion/errors/InvalidArgument';
export {ConversionFailure} from './components/conversion/errors/ConversionFailure';
export {InvalidTimestamp} from './components/observation/errors/InvalidTimestamp';
