interface DataFormatLocation {
  table: string;
  row?: number;
  column?: string;
}

/**
 * A source table is missing a required column or holds a value that cannot be
 * parsed. Raised at load time; the dataset is never built from a partial load.
 */
export class DataFormatError extends Error {
  readonly table: string;
  readonly row?: number;
  readonly column?: string;

  constructor(message: string, location: DataFormatLocation) {
    const where = [
      location.table,
      location.row !== undefined ? `row ${location.row}` : null,
      location.column ? `column "${location.column}"` : null,
    ]
      .filter(Boolean)
      .join(", ");
    super(`${where}: ${message}`);
    this.name = "DataFormatError";
    this.table = location.table;
    this.row = location.row;
    this.column = location.column;
  }
}

export function isDataFormatError(error: unknown): error is DataFormatError {
  return error instanceof DataFormatError;
}
