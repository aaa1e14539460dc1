import { OracleError, errorMessage } from '../errors';
import { ModelWrapper } from '../types';

async function scoreOnce(oracle: ModelWrapper, bytes: Buffer): Promise<number> {
  const value = await oracle.score(bytes);
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new OracleError(`Oracle returned a non-numeric score: ${String(value)}`, true);
  }
  if (value < 0 || value > 1) throw new OracleError(`Oracle score ${value} outside [0,1]`, true);
  return value;
}

// One retry, then the failure is surfaced as non-retryable
export async function scoreWithRetry(oracle: ModelWrapper, bytes: Buffer, verbose = false): Promise<number> {
  try {
    return await scoreOnce(oracle, bytes);
  } catch (first) {
    if (first instanceof OracleError && !first.retryable) throw first;
    if (verbose) console.warn(`⚠️  Oracle call failed (${errorMessage(first)}), retrying once`);
    try {
      return await scoreOnce(oracle, bytes);
    } catch (second) {
      throw new OracleError(`Oracle failed twice: ${errorMessage(second)}`, false, second);
    }
  }
}
