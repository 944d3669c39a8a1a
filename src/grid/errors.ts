/**
 * Roll grid error classes (both fatal)
 */

/**
 * The header row lacks a required column
 */
export class GridSchemaError extends Error {
  public readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      `Roll grid header is missing column(s): ${missingColumns
        .map((column) => `"${column}"`)
        .join(", ")}`,
    );
    this.name = "GridSchemaError";
    this.missingColumns = missingColumns;
  }
}

/**
 * The spreadsheet could not be read
 */
export class GridSourceError extends Error {
  constructor(message: string) {
    super(`Failed to read roll grid: ${message}`);
    this.name = "GridSourceError";
  }
}
