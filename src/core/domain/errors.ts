/** Missing or invalid configuration. Fatal before any filesystem work. */
export class StartupConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupConfigError";
  }
}

/**
 * Part of the watched tree could not be read (permissions, vanished entry).
 * The rest of the scan carries on without it.
 */
export class ScanSubtreeError extends Error {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read ${path}: ${formatError(options?.cause)}`, options);
    this.name = "ScanSubtreeError";
  }
}

/** One file could not be transferred. The batch moves on to the next file. */
export class UploadError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UploadError";
  }
}

export class LedgerReadError extends Error {
  constructor(
    public readonly ledgerPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to read ledger ${ledgerPath}. ${message}`, options);
    this.name = "LedgerReadError";
  }
}

/** An outcome could not be persisted. The run must stop. */
export class LedgerWriteError extends Error {
  constructor(
    public readonly ledgerPath: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Failed to write ledger ${ledgerPath}. ${formatError(options?.cause)}`,
      options,
    );
    this.name = "LedgerWriteError";
  }
}

export function isFatalRunError(
  e: unknown,
): e is StartupConfigError | LedgerReadError | LedgerWriteError {
  return (
    e instanceof StartupConfigError ||
    e instanceof LedgerReadError ||
    e instanceof LedgerWriteError
  );
}

export function formatError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
