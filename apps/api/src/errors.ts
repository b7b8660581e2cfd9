export class DataLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataLoadError';
  }
}

export class MissingColumnsError extends Error {
  readonly columns: string[];

  constructor(columns: string[]) {
    super(`Missing columns: ${columns.join(', ')}`);
    this.name = 'MissingColumnsError';
    this.columns = columns;
  }
}

export class UnknownPageError extends Error {
  constructor(page: string) {
    super(`Unknown page: ${page}`);
    this.name = 'UnknownPageError';
  }
}
