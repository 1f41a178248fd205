/**
 * Corpus Zod Schemas
 */

import { z } from 'zod';
import { METRIC_NAMES } from '../types/corpus.types';

// -- Enums --

export const metricNameEnum = z.enum(METRIC_NAMES);

export const normalizedTextPrecedenceEnum = z.enum(['trusted', 'untrusted']);

// -- Option Schemas --

export const comparisonBudgetSchema = z.object({
  deadlineMs: z.number().int().positive('deadlineMs must be positive').optional(),
  maxFragmentComparisons: z.number().int().positive('maxFragmentComparisons must be positive').optional(),
  signal: z.instanceof(AbortSignal).optional(),
});

export const corpusStoreOptionsSchema = z.object({
  n: z.number().int('n must be an integer').min(1, 'n must be at least 1'),
  s: z.number().int('s must be an integer').min(0, 's must not be negative'),
  metric: metricNameEnum,
  normalizedTextPrecedence: normalizedTextPrecedenceEnum.default('untrusted'),
  budget: comparisonBudgetSchema.optional(),
});

export const ownerIdSchema = z.string().min(1, 'Owner ID must not be empty');

// -- CLI Schemas --

export const cliArgsSchema = z.object({
  trustedDir: z.string().min(1).optional(),
  untrustedDir: z.string().min(1, '--untrusted <dir> is required'),
  n: z.coerce.number().int('n must be an integer').min(1, 'n must be at least 1'),
  s: z.coerce.number().int('s must be an integer').min(0, 's must not be negative'),
  metric: metricNameEnum,
  normalizedTextPrecedence: normalizedTextPrecedenceEnum,
  deadlineMs: z.coerce.number().int().positive('deadlineMs must be positive').optional(),
  maxFragmentComparisons: z.coerce.number().int().positive('maxFragmentComparisons must be positive').optional(),
});

// -- Report Schemas --

const fragmentLocationTupleSchema = z.tuple([z.number().int().min(0), z.number().int().min(0)]);

export const serializedResultSchema = z.object({
  owner_id1: z.string(),
  owner_id2: z.string(),
  matching_fragments: z.array(z.tuple([z.string(), z.string()])),
  matching_fragments_locations: z.array(
    z.tuple([z.array(fragmentLocationTupleSchema), z.array(fragmentLocationTupleSchema)])
  ),
  trusted_owner1: z.boolean(),
  equal_fragments: z.boolean(),
}).refine(
  (result) => result.matching_fragments.length === result.matching_fragments_locations.length,
  { message: 'matching_fragments and matching_fragments_locations must have the same length' }
);

export const serializedResultsSchema = z.array(serializedResultSchema);

// -- Type Exports --

export type CorpusStoreOptionsInput = z.input<typeof corpusStoreOptionsSchema>;
export type CorpusStoreOptions = z.infer<typeof corpusStoreOptionsSchema>;
export type CliArgs = z.infer<typeof cliArgsSchema>;
export type SerializedResult = z.infer<typeof serializedResultSchema>;
