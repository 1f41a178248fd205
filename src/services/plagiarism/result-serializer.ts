/**
 * Result Serialization
 *
 * One snake_case JSON object per PlagiarismResult, locations as [start, end].
 */

import { serializedResultsSchema, SerializedResult } from '../../schemas/corpus.schemas';
import { FragmentLocation, PlagiarismResult } from '../../types/corpus.types';
import { AppError } from '../../utils/app-error';

type LocationTuple = [start: number, end: number];

const toTuple = (location: FragmentLocation): LocationTuple => [location.start, location.end];

const fromTuple = ([start, end]: LocationTuple): FragmentLocation => ({ start, end });

export function serializeResult(result: PlagiarismResult): SerializedResult {
  return {
    owner_id1: result.owner1,
    owner_id2: result.owner2,
    matching_fragments: result.matchingFragments.map(([a, b]): [string, string] => [a, b]),
    matching_fragments_locations: result.matchingFragmentsLocations.map(
      ([a, b]): [LocationTuple[], LocationTuple[]] => [a.map(toTuple), b.map(toTuple)]
    ),
    trusted_owner1: result.trustedOwner1,
    equal_fragments: result.equalFragments,
  };
}

export function serializeResults(results: readonly PlagiarismResult[]): SerializedResult[] {
  return results.map(serializeResult);
}

/**
 * Read back a JSON report written by serializeResults.
 */
export function parseSerializedResults(json: string): PlagiarismResult[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw AppError.invalidInput('Report is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = serializedResultsSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.invalidInput(
      `Malformed report: ${parsed.error.errors.map((e) => e.message).join('; ')}`
    );
  }

  return parsed.data.map((record) => ({
    owner1: record.owner_id1,
    owner2: record.owner_id2,
    matchingFragments: record.matching_fragments,
    matchingFragmentsLocations: record.matching_fragments_locations.map(
      ([a, b]): [FragmentLocation[], FragmentLocation[]] => [a.map(fromTuple), b.map(fromTuple)]
    ),
    trustedOwner1: record.trusted_owner1,
    equalFragments: record.equal_fragments,
  }));
}
