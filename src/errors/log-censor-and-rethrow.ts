import {OperationalError} from './OperationalError';
import {UnexpectedError} from './UnexpectedError';
import * as logger from '../utils/logger';

export function logCensorAndRethrow(operationName: string, err: unknown): never {

  //------------------------
  // Operational Errors
  //------------------------
  if (err instanceof OperationalError) {
    // e.g. the upstream API being down deserves a 'warn' rather than a full 'error'.
    logger.warn(`Operational error whilst running ${operationName}.`, err);
    throw err;

  //------------------------
  // Programmer Errors
  //------------------------
  } else {
    logger.error(`Unexpected error whilst running ${operationName}.`, err);
    // We don't want callers to see the details of programmer errors.
    throw new UnexpectedError();

  }

}
