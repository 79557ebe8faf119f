/**
 * Errors surfaced to callers of Classify and Resolve. Layer failures are
 * never surfaced; they are logged and the next layer takes over.
 */

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Disambiguation session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class InvalidSelectionError extends Error {
  constructor(
    public readonly sessionId: string,
    public readonly optionId: string,
    public readonly validOptions: string[],
  ) {
    super(
      `Option "${optionId}" was not offered in session ${sessionId} (valid: ${validOptions.join(', ')})`,
    );
    this.name = 'InvalidSelectionError';
  }
}

export class ClassificationAbortedError extends Error {
  constructor() {
    super('Classification aborted');
    this.name = 'ClassificationAbortedError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ClassificationAbortedError();
  }
}
