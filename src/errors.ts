export class StorytellerError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "StorytellerError";
  }
}

/** The caller supplied an empty query or an unusable retrieval width. */
export class InvalidInputError extends StorytellerError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** The embedder or the similarity index could not answer. */
export class UnavailableDependencyError extends StorytellerError {
  constructor(dependency: string, cause?: unknown) {
    super(`${dependency} unavailable${describeCause(cause)}`, cause);
    this.name = "UnavailableDependencyError";
  }
}

/** The hosted language model failed or returned nothing. */
export class DependencyError extends StorytellerError {
  constructor(message: string, cause?: unknown) {
    super(`${message}${describeCause(cause)}`, cause);
    this.name = "DependencyError";
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined || cause === null) return "";
  const detail = cause instanceof Error ? cause.message : String(cause);
  return detail ? `: ${detail}` : "";
}
