/**
 * Environment Snapshot
 *
 * Immutable copy of the process environment. Encoders receive a snapshot at
 * construction instead of reading process.env, so tests can supply their own.
 */

import { z } from 'zod';
import { LOG_GROUP_NAME_ENV, LOG_STREAM_NAME_ENV } from './telemetry-config.js';
import { ConfigurationError } from '../errors/telemetry-error.js';

const rawEnvironmentSchema = z.record(z.string(), z.string().optional());

export type RawEnvironment = z.infer<typeof rawEnvironmentSchema>;

export class EnvironmentSnapshot {
  private readonly values: ReadonlyMap<string, string>;

  private constructor(values: Map<string, string>) {
    this.values = values;
  }

  /**
   * Capture a snapshot from an environment-like record. Undefined entries are skipped.
   */
  static capture(env: RawEnvironment): EnvironmentSnapshot {
    const result = rawEnvironmentSchema.safeParse(env);
    if (!result.success) {
      throw new ConfigurationError('Environment values must be strings', {
        details: {
          issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
        },
      });
    }

    const values = new Map<string, string>();
    for (const [name, value] of Object.entries(result.data)) {
      if (value !== undefined) values.set(name, value);
    }
    return new EnvironmentSnapshot(values);
  }

  static empty(): EnvironmentSnapshot {
    return new EnvironmentSnapshot(new Map());
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get logGroupName(): string {
    return this.values.get(LOG_GROUP_NAME_ENV) ?? '';
  }

  get logStreamName(): string {
    return this.values.get(LOG_STREAM_NAME_ENV) ?? '';
  }

  get size(): number {
    return this.values.size;
  }

  toRecord(): Readonly<Record<string, string>> {
    return Object.freeze(Object.fromEntries(this.values));
  }
}

let processEnvironment: EnvironmentSnapshot | undefined;

/**
 * Snapshot of process.env, captured on first use and reused for the life of the process
 */
export function getProcessEnvironment(): EnvironmentSnapshot {
  if (!processEnvironment) {
    processEnvironment = EnvironmentSnapshot.capture(process.env);
  }
  return processEnvironment;
}

export function resetProcessEnvironment(): void {
  processEnvironment = undefined;
}
