/**
 * Base Repository
 *
 * Abstract base class for Supabase-backed repositories.
 * Provides error wrapping and row validation.
 */

import type { SupabaseClient, PostgrestError } from '@supabase/supabase-js';
import type { ZodType } from 'zod';
import { createLogger, type Logger } from '../utils/logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly pgError: PostgrestError,
    public readonly context: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RepositoryError';
  }

  get code(): string {
    return this.pgError.code;
  }
}

/** PostgreSQL unique_violation. */
export const UNIQUE_VIOLATION = '23505';

// ─────────────────────────────────────────────────────────────────────────────
// Base Repository
// ─────────────────────────────────────────────────────────────────────────────

export abstract class BaseRepository {
  protected readonly logger: Logger;

  constructor(
    protected readonly supabase: SupabaseClient,
    loggerName: string,
  ) {
    this.logger = createLogger(loggerName);
  }

  /**
   * Wrap a Supabase error with context for logging.
   */
  protected wrapError(
    message: string,
    error: PostgrestError,
    context: Record<string, unknown> = {},
  ): RepositoryError {
    this.logger.error({ ...context, error: error.message, code: error.code }, message);
    return new RepositoryError(`${message}: ${error.message}`, error, context);
  }

  /**
   * Validate a row returned by PostgREST against the expected shape.
   */
  protected parseRow<T>(schema: ZodType<T>, row: unknown, context: Record<string, unknown> = {}): T {
    const result = schema.safeParse(row);
    if (!result.success) {
      this.logger.error({ ...context, issues: result.error.issues }, 'unexpected row shape');
      throw new Error('Unexpected row shape returned by database');
    }
    return result.data;
  }

  protected parseRows<T>(schema: ZodType<T>, rows: unknown, context: Record<string, unknown> = {}): T[] {
    if (!Array.isArray(rows)) return [];
    return rows.map((row) => this.parseRow(schema, row, context));
  }
}
