export interface Observation {
  Datastream: {'@iot.id': string};
  phenomenonTime: string;
  resultTime: string;
  result: number;
}
