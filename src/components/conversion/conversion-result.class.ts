import {Thing} from '../thing/thing.class';
import {Location} from '../location/location.class';
import {Datastream} from '../datastream/datastream.class';
import {Observation} from '../observation/observation.class';

export interface SnapshotConversion {
  Things: Thing[];
  Locations: Location[];
  Datastreams: Datastream[];
  Observations: Observation[];
}

export interface TimeseriesConversion {
  Observations: Observation[];
}
