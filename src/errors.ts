/**
 * errors.ts — Typed failures for the trip ingestion pipeline
 *
 * Every error carries a stable, machine-readable `code` so log lines and
 * run summaries can be filtered without parsing messages.
 *
 * Scope:
 *   CONFIGURATION_ERROR, SCHEMA_MISMATCH, LEDGER_CHECK_ERROR — abort the run
 *   DISCOVERY_ERROR, PROJECTION_ERROR, INGESTION_ERROR       — one file only
 */

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const IngestErrorCode = {
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  SCHEMA_MISMATCH: "SCHEMA_MISMATCH",
  DISCOVERY_ERROR: "DISCOVERY_ERROR",
  PROJECTION_ERROR: "PROJECTION_ERROR",
  INGESTION_ERROR: "INGESTION_ERROR",
  LEDGER_CHECK_ERROR: "LEDGER_CHECK_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type IngestErrorCodeValue = (typeof IngestErrorCode)[keyof typeof IngestErrorCode];

// ─── Base ───────────────────────────────────────────────────────

export class IngestPipelineError extends Error {
  override readonly name: string = "IngestPipelineError";
  readonly code: IngestErrorCodeValue;

  constructor(code: IngestErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

// ─── Run-level (fatal) ──────────────────────────────────────────

/** Malformed schema registry: duplicate canonical name or alias. */
export class ConfigurationError extends IngestPipelineError {
  override readonly name = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(IngestErrorCode.CONFIGURATION_ERROR, message, options);
  }
}

/** Existing table does not have the canonical shape. No migration is attempted. */
export class SchemaMismatchError extends IngestPipelineError {
  override readonly name = "SchemaMismatchError";
  readonly expected: string[];
  readonly actual: string[];

  constructor(tableName: string, expected: string[], actual: string[]) {
    super(
      IngestErrorCode.SCHEMA_MISMATCH,
      `table ${tableName} does not match the canonical schema`
        + ` (expected [${expected.join(", ")}], found [${actual.join(", ")}])`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/** The ledger query failed, so it is unknown whether the file was imported. */
export class LedgerCheckError extends IngestPipelineError {
  override readonly name = "LedgerCheckError";
  readonly sourceFile: string;

  constructor(sourceFile: string, options?: { cause?: unknown }) {
    super(
      IngestErrorCode.LEDGER_CHECK_ERROR,
      `ledger check failed for ${sourceFile}: ${causeMessage(options?.cause)}`,
      options,
    );
    this.sourceFile = sourceFile;
  }
}

// ─── Per-file ───────────────────────────────────────────────────

export class DiscoveryError extends IngestPipelineError {
  override readonly name = "DiscoveryError";
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(
      IngestErrorCode.DISCOVERY_ERROR,
      `could not read columns of ${filePath}: ${causeMessage(options?.cause)}`,
      options,
    );
    this.filePath = filePath;
  }
}

export class ProjectionError extends IngestPipelineError {
  override readonly name = "ProjectionError";

  constructor(message: string) {
    super(IngestErrorCode.PROJECTION_ERROR, message);
  }
}

export class IngestionError extends IngestPipelineError {
  override readonly name = "IngestionError";
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(
      IngestErrorCode.INGESTION_ERROR,
      `bulk load of ${filePath} failed: ${causeMessage(options?.cause)}`,
      options,
    );
    this.filePath = filePath;
  }
}

// ─── Helpers ────────────────────────────────────────────────────

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown cause";
  return String(cause);
}

/** Flatten any thrown value into a log-friendly `{ code, message }` pair. */
export function describeError(err: unknown): { code: IngestErrorCodeValue; message: string } {
  if (err instanceof IngestPipelineError) {
    return { code: err.code, message: err.message };
  }
  return { code: IngestErrorCode.INTERNAL_ERROR, message: causeMessage(err) };
}
