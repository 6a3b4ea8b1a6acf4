// lib/errors.ts
// Failure classes of the query pipeline. `status` is what the client sees;
// `publicMessage` is safe to return, `message` may carry upstream detail and
// only goes to the logs.

export abstract class RagError extends Error {
  abstract get status(): number;
  abstract get publicMessage(): string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputValidationError extends RagError {
  constructor(message: string, readonly usage?: string) {
    super(message);
  }

  get status(): number {
    return 400;
  }

  get publicMessage(): string {
    return this.message;
  }
}

/** Base for failures of a managed dependency (embedding, index, generation). */
export abstract class UpstreamError extends RagError {
  constructor(
    message: string,
    readonly timedOut = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  get status(): number {
    return this.timedOut ? 504 : 502;
  }
}

export class EmbeddingError extends UpstreamError {
  get publicMessage(): string {
    return this.timedOut
      ? "The embedding service timed out"
      : "The embedding service is unavailable";
  }
}

export class RetrievalError extends UpstreamError {
  get publicMessage(): string {
    return this.timedOut
      ? "The document index timed out"
      : "The document index is unavailable";
  }
}

export class GenerationError extends UpstreamError {
  get publicMessage(): string {
    return this.timedOut
      ? "The answer generation timed out"
      : "The answer generation service is unavailable";
  }
}

/** Non-2xx answer or transport failure from an HTTP provider. */
export class UpstreamHttpError extends Error {
  constructor(
    message: string,
    readonly httpStatus: number | null,
    readonly retryable: boolean,
    readonly timedOut = false
  ) {
    super(message);
    this.name = "UpstreamHttpError";
  }
}

export type ChunkFailure = { key: string; title: string; chunkIndex: number; reason: string };

export class IndexBuildError extends Error {
  constructor(readonly failures: ChunkFailure[]) {
    super(
      `Embedding failed for ${failures.length} chunk(s): ` +
        failures
          .slice(0, 5)
          .map((f) => `${f.title}#${f.chunkIndex} (${f.reason})`)
          .join(", ")
    );
    this.name = "IndexBuildError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
