/**
 * Embedded Metric Format Record
 *
 * Wire shape of one structured metric log line. Top-level keys form a flat
 * property bag; the `_aws` block declares which of them are metrics and
 * which are dimensions.
 */

import { z } from 'zod';
import { metricUnitSchema } from './MetricUnits.js';

export const LOG_GROUP_NAME_KEY = 'log_group_name';
// Consumers match this literal as emitted; the missing "r" is part of the contract
export const LOG_STREAM_NAME_KEY = 'log_steam_name';
export const EMF_METADATA_KEY = '_aws';
export const MAX_DIMENSIONS_PER_SET = 9;

export const emfMetricDefinitionSchema = z.object({
  Name: z.string(),
  Unit: metricUnitSchema,
});

export const emfDirectiveSchema = z.object({
  Namespace: z.string(),
  Dimensions: z.array(z.array(z.string())),
  Metrics: z.array(emfMetricDefinitionSchema),
});

export const emfMetadataSchema = z.object({
  Timestamp: z.number().int().nonnegative(),
  CloudWatchMetrics: z.array(emfDirectiveSchema),
});

export const emfRecordSchema = z
  .object({
    [LOG_GROUP_NAME_KEY]: z.string(),
    [LOG_STREAM_NAME_KEY]: z.string(),
    [EMF_METADATA_KEY]: emfMetadataSchema,
  })
  .catchall(z.unknown());

/**
 * Shape of a record as its producer holds it: only the metadata block is
 * fixed, since properties may overwrite the reserved log fields.
 */
export const emfDocumentSchema = z.object({ [EMF_METADATA_KEY]: emfMetadataSchema }).catchall(z.unknown());

export type EmfMetricDefinition = z.infer<typeof emfMetricDefinitionSchema>;
export type EmfDirective = z.infer<typeof emfDirectiveSchema>;
export type EmfMetadata = z.infer<typeof emfMetadataSchema>;
export type EmfRecord = z.infer<typeof emfRecordSchema>;
export type EmfDocument = z.infer<typeof emfDocumentSchema>;

export class EmfRecordParseError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
    public readonly rawLine: string
  ) {
    super(message);
    this.name = 'EmfRecordParseError';
  }
}

export type EmfRecordParseResult = { success: true; data: EmfRecord } | { success: false; error: EmfRecordParseError };

function stripLineTerminator(line: string): string {
  return line.endsWith('\n') ? line.slice(0, -1) : line;
}

/**
 * Parse and validate one encoded line. A single trailing newline is accepted.
 */
export function parseEmfRecord(line: string): EmfRecord {
  const body = stripLineTerminator(line);
  if (body.includes('\n')) {
    throw new EmfRecordParseError('EMF record must occupy exactly one line', [], line);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EmfRecordParseError(`EMF record is not valid JSON: ${reason}`, [], line);
  }

  const result = emfRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new EmfRecordParseError(`EMF record validation failed: ${result.error.message}`, result.error.issues, line);
  }
  return result.data;
}

export function tryParseEmfRecord(line: string): EmfRecordParseResult {
  try {
    return { success: true, data: parseEmfRecord(line) };
  } catch (error) {
    if (error instanceof EmfRecordParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Names declared under `_aws` (metrics and dimensions) that have no top-level value.
 */
export function findUndeclaredReferences(record: EmfRecord): string[] {
  const missing = new Set<string>();
  for (const directive of record[EMF_METADATA_KEY].CloudWatchMetrics) {
    for (const metric of directive.Metrics) {
      if (!(metric.Name in record)) missing.add(metric.Name);
    }
    for (const dimensionSet of directive.Dimensions) {
      for (const dimension of dimensionSet) {
        if (!(dimension in record)) missing.add(dimension);
      }
    }
  }
  return [...missing];
}
