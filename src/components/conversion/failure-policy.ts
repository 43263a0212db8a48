import * as logger from '../../utils/logger';
import {logCensorAndRethrow} from '../../errors/log-censor-and-rethrow';
import {ConversionFailure} from './errors/ConversionFailure';

// fail-fast: errors reach the caller.
// fail-safe: errors are logged and the fallback is returned instead.
export type FailurePolicy = 'fail-fast' | 'fail-safe';


export async function applyFailurePolicy<T>(operationName: string, policy: 'fail-fast', work: () => Promise<T>): Promise<T>;
export async function applyFailurePolicy<T>(operationName: string, policy: 'fail-safe', work: () => Promise<T>, fallback: () => T): Promise<T>;
export async function applyFailurePolicy<T>(
  operationName: string,
  policy: FailurePolicy,
  work: () => Promise<T>,
  fallback?: () => T
): Promise<T> {

  try {
    return await work();
  } catch (err) {

    if (policy === 'fail-safe' && fallback) {
      const failure = new ConversionFailure(`${operationName} failed, returning a fallback result instead.`, err instanceof Error ? err.message : String(err));
      logger.error(failure.message, failure);
      return fallback();
    }

    return logCensorAndRethrow(operationName, err);

  }

}
