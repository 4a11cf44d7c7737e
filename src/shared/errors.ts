export class RowParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RowParseError";
  }
}

export class StructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructureError";
  }
}

export class TableNotFoundError extends StructureError {
  readonly heading: string;

  constructor(heading: string) {
    super(`No table found under heading "${heading}"`);
    this.name = "TableNotFoundError";
    this.heading = heading;
  }
}

export class NetworkError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
    this.status = status;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
