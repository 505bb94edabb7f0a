export class ExtractionError extends Error {
  constructor(
    public readonly documentId: string,
    cause: Error
  ) {
    super(`Failed to extract slides from ${documentId}: ${cause.message}`, { cause });
    this.name = "ExtractionError";
  }
}

export class CompactionError extends Error {
  constructor(
    public readonly documentId: string,
    cause: Error
  ) {
    super(`Failed to compact ${documentId}: ${cause.message}`, { cause });
    this.name = "CompactionError";
  }
}

export class InvalidInputError extends Error {
  constructor(public readonly inputPath: string) {
    super(`The input path ${inputPath} is neither a file nor a directory.`);
    this.name = "InvalidInputError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
