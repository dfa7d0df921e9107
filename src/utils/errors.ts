/**
 * Error types surfaced to the entry point
 */

/**
 * The command line could not be turned into a runnable session.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * An archive entry would be written outside the extraction root.
 */
export class PathTraversalError extends Error {
  readonly entryPath: string;
  readonly destination: string;

  constructor(entryPath: string, destination: string, reason?: string) {
    super(
      `Path traversal detected: ${entryPath} escapes ${destination}` +
        (reason ? ` (${reason})` : ''),
    );
    this.name = 'PathTraversalError';
    this.entryPath = entryPath;
    this.destination = destination;
  }
}

export class UnsupportedArchiveError extends Error {
  readonly format: string;

  constructor(format: string, archivePath: string) {
    super(`Unsupported archive compression "${format}": ${archivePath}`);
    this.name = 'UnsupportedArchiveError';
    this.format = format;
  }
}

/**
 * Standard input ended while a prompt was waiting for an answer.
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed before an answer was given');
    this.name = 'InputClosedError';
  }
}
