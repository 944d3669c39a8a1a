/**
 * Google Sheets implementation of GridSource
 */

import type { GoogleSheetsClient } from "@/clients/googleSheets";
import type { GridSource } from "@/interfaces/grid/gridSource";
import type { GridValues } from "@/types/grid";
import { parseA1StartRow } from "@/utils/sheets/sheetsHelpers";
import { GridSourceError } from "./errors";

/**
 * The only client capability the grid needs
 */
export type SheetRangeReader = Pick<GoogleSheetsClient, "readRange">;

export class SheetsGridSource implements GridSource {
  readonly description: string;

  constructor(
    private readonly client: SheetRangeReader,
    private readonly range: string,
    spreadsheetId: string,
  ) {
    this.description = `sheet ${spreadsheetId} ${range}`;
  }

  /**
   * The header row number comes from the range the API echoes back, so a
   * range starting below row 1 still yields sheet row numbers.
   *
   * @throws {GridSourceError} If the read fails (after client retries)
   */
  async readValues(): Promise<GridValues> {
    const result = await this.client.readRange(this.range);
    if (!result.ok) {
      const status = result.error.status ? ` (status ${result.error.status})` : "";
      throw new GridSourceError(`${this.range}${status}: ${result.error.message}`);
    }
    return {
      values: result.data.values ?? [],
      headerRowNumber: parseA1StartRow(result.data.range),
    };
  }
}
