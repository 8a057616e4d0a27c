/**
 * Error classes for the collection and scoring pipeline
 */

export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineError";
  }
}

/**
 * Input is unusable as a whole: missing columns, or nothing left to analyze.
 * Aborts the run.
 */
export class StructuralError extends PipelineError {
  constructor(message: string, public stage: string) {
    super(`${stage}: ${message}`);
    this.name = "StructuralError";
  }
}

/**
 * A lexicon or stop-word list could not be read or has the wrong shape.
 * Aborts the run.
 */
export class LexiconError extends PipelineError {
  constructor(message: string, public filePath: string) {
    super(`${filePath}: ${message}`);
    this.name = "LexiconError";
  }
}

/**
 * One thread could not be fetched or parsed. The collector skips the thread.
 */
export class ThreadFetchError extends PipelineError {
  constructor(
    message: string,
    public url: string,
    public statusCode?: number
  ) {
    super(`Failed to fetch ${url}: ${message}`);
    this.name = "ThreadFetchError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
