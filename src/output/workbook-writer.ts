/**
 * @fileoverview Workbook delivery
 *
 * Writes exports into Excel worksheets using ExcelJS. Every export row
 * becomes one worksheet row, so blank separator rows keep their place.
 */

import ExcelJS from "exceljs";
import type { TabularExporter } from "../exporters/base-exporter";

type Workbook = ExcelJS.Workbook;
type Worksheet = ExcelJS.Worksheet;

/** Excel's limit on worksheet name length */
const MAX_SHEET_NAME_LENGTH = 31;

/**
 * Turn a filename hint into a name Excel accepts: forbidden characters
 * (`* ? : \ / [ ]`) become underscores, leading and trailing apostrophes
 * are dropped after cutting the name to 31 characters
 */
export function toSheetName(hint: string): string {
  const name = hint
    .replace(/[*?:\\\/\[\]]/g, "_")
    .slice(0, MAX_SHEET_NAME_LENGTH)
    .replace(/^'+|'+$/g, "");
  return name.length > 0 ? name : "Export";
}

/**
 * Append an export to a new worksheet of the workbook
 *
 * @param sheetName - Worksheet name; defaults to the exporter's filename
 * hint made safe with `toSheetName`
 */
export function addExportSheet(
  workbook: Workbook,
  exporter: TabularExporter,
  sheetName: string = toSheetName(exporter.getFilename()),
): Worksheet {
  const worksheet = workbook.addWorksheet(sheetName);

  for (const row of exporter.iterRows()) {
    worksheet.addRow([...row]);
  }

  return worksheet;
}

/**
 * Build a single-sheet `.xlsx` file holding the export
 */
export async function toWorkbookBuffer(
  exporter: TabularExporter,
  sheetName?: string,
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  addExportSheet(workbook, exporter, sheetName);
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}
