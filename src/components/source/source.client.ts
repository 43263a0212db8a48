import axios, {AxiosResponse} from 'axios';
import * as logger from '../../utils/logger';
import {TransportError} from './errors/TransportError';
import {ParseError} from './errors/ParseError';


export interface SourceClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

// What the converter needs from the upstream API. Tests provide their own in-process implementation.
export interface Source {
  fetchSnapshot(): Promise<string>;
  fetchTimeseries(stationId: string, timeFrom?: string, timeTo?: string): Promise<unknown>;
}


export class SourceClient implements Source {

  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  public constructor(options: SourceClientOptions) {
    // Trailing slashes would give us double slashes when the endpoint paths are appended.
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }


  //-------------------------------------------------
  // Latest snapshot
  //-------------------------------------------------
  public async fetchSnapshot(): Promise<string> {

    const url = `${this.baseUrl}/latest`;
    logger.debug(`Requesting latest snapshot from ${url}`);

    const response = await this.get(url, {});

    if (!isSuccess(response.status)) {
      throw new TransportError(`Request for the latest snapshot failed with status code ${response.status}`, response.status);
    }

    return response.data;

  }


  //-------------------------------------------------
  // Timeseries for a single station
  //-------------------------------------------------
  public async fetchTimeseries(stationId: string, timeFrom?: string, timeTo?: string): Promise<unknown> {

    const url = `${this.baseUrl}/timeseries`;
    const params = {stationId, timeFrom, timeTo};
    logger.debug(`Requesting timeseries for station ${stationId} from ${url}`, params);

    const response = await this.get(url, params);

    if (response.status === 204) {
      return [];
    }

    if (!isSuccess(response.status)) {
      throw new TransportError(`Request for the timeseries of station ${stationId} failed with status code ${response.status}`, response.status);
    }

    if (response.data.trim() === '') {
      return [];
    }

    try {
      return JSON.parse(response.data);
    } catch (err) {
      const parseError = new ParseError(`Response for station ${stationId} is not valid JSON.`, err instanceof Error ? err.message : undefined);
      logger.warn(parseError.message, parseError);
      return [];
    }

  }


  private async get(url: string, params: Record<string, string | undefined>): Promise<AxiosResponse<string>> {

    let response: AxiosResponse<string>;
    try {
      response = await axios.get<string>(url, {
        params,
        timeout: this.timeoutMs,
        responseType: 'text',
        // We want to decide for ourselves what counts as a failure
        validateStatus: (): boolean => true
      });
    } catch (err) {
      throw new TransportError(`Failed to reach ${url}`, undefined, err instanceof Error ? err.message : String(err));
    }

    // axios hands back an empty string or undefined for bodiless responses depending on the adapter.
    return Object.assign({}, response, {data: typeof response.data === 'string' ? response.data : ''});

  }

}


function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
