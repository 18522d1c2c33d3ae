import { InvalidAddressError } from "./config";
import { mapWithConcurrency } from "./pool";
import { scoreRepository } from "./score";
import type { ScoreOptions, ScoreResult } from "./types";

export type AddressOutcome =
  | { address: string; ok: true; result: ScoreResult }
  | { address: string; ok: false; error: InvalidAddressError };

export interface BatchSummary {
  outcomes: AddressOutcome[];
  failures: number;
  skipped: number;
}

/**
 * Scores one address. A malformed address is reported and returned as a
 * failed outcome; anything else that throws propagates.
 */
export async function scoreAddress(
  address: string,
  scoreOptions: ScoreOptions,
  onResult?: (result: ScoreResult) => void
): Promise<AddressOutcome> {
  console.log(`\n⏳ Scoring ${address}`);
  try {
    const result = await scoreRepository(address, scoreOptions);
    onResult?.(result);
    return { address, ok: true, result };
  } catch (error) {
    if (error instanceof InvalidAddressError) {
      console.error(`❌ ${error.message}`);
      return { address, ok: false, error };
    }
    throw error;
  }
}

export async function scoreAddresses(
  addresses: readonly string[],
  scoreOptions: ScoreOptions,
  { concurrency, onResult }: { concurrency: number; onResult?: (result: ScoreResult) => void }
): Promise<BatchSummary> {
  const { results } = await mapWithConcurrency(
    addresses,
    (address) => scoreAddress(address, scoreOptions, onResult),
    { concurrency, signal: scoreOptions.signal }
  );

  const outcomes = results.filter((outcome): outcome is AddressOutcome => outcome !== undefined);
  return {
    outcomes,
    failures: outcomes.filter((outcome) => !outcome.ok).length,
    skipped: addresses.length - outcomes.length,
  };
}
