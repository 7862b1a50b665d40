export class TableFormatterError extends Error {
  constructor(message: string) {
    super(`fixed-width-table: ${message}`);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends TableFormatterError {
  constructor(what = 'records') {
    super(`cannot render a table with no ${what}`);
  }
}

export class MissingFieldError extends TableFormatterError {
  constructor(
    readonly header: string,
    readonly recordIndex: number
  ) {
    super(`record ${recordIndex} has no value for header "${header}"`);
  }
}

// Raised for mismatches the extractor should never produce.
export class TableInvariantError extends TableFormatterError {}

export class ConfigError extends TableFormatterError {
  constructor(
    message: string,
    readonly errors: string[] = []
  ) {
    super(errors.length ? `${message}: ${errors.join('; ')}` : message);
  }
}
