/**
 * Layout sheet converter
 *
 * Turns a fixed-width record layout kept in a spreadsheet (columns Item,
 * Field, Size, Position) into the JSON field map used by the file readers:
 *
 *   { "detail": { "1": { "fieldName", "dataType": "string", "size", "pos" }, ... } }
 */

import { Workbook, Worksheet } from "exceljs";
import { ERROR_CODES, ProcessingErrorSeverity, WorkflowError } from "../agents/types";
import type { WorkflowLogger } from "../logging/logging";

export class MissingColumnError extends WorkflowError {
  constructor(public readonly column: string, message: string) {
    super(ERROR_CODES.MISSING_COLUMN, message, ProcessingErrorSeverity.HIGH, { column });
    this.name = "MissingColumnError";
  }
}

export class LayoutSheetError extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ERROR_CODES.UNREADABLE_WORKBOOK, message, ProcessingErrorSeverity.HIGH, context);
    this.name = "LayoutSheetError";
  }
}

export interface LayoutField {
  fieldName: string;
  dataType: "string";
  size: number;
  pos: string;
}

export interface LayoutDocument {
  detail: Record<string, LayoutField>;
}

/** One data row, with `item` forward-filled from the rows above. */
export interface LayoutRow {
  rowNumber: number;
  item?: string;
  field?: string;
  size?: string;
  position?: string;
}

const REQUIRED_COLUMNS = ["Field", "Size", "Position"] as const;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function cellText(worksheet: Worksheet, rowNumber: number, column: number | undefined): string | undefined {
  if (column === undefined) return undefined;
  const cell = worksheet.getRow(rowNumber).getCell(column);
  if (cell.value === null || cell.value === undefined) return undefined;
  return cell.text;
}

/**
 * Header name → column number, names trimmed.
 */
export function readHeader(worksheet: Worksheet): Map<string, number> {
  const header = new Map<string, number>();
  worksheet.getRow(1).eachCell((cell, colNumber) => {
    const name = cell.text.trim();
    if (name && !header.has(name)) {
      header.set(name, colNumber);
    }
  });
  return header;
}

/**
 * Validates the header and reads every data row. Raises MissingColumnError
 * before any row is read.
 */
export function readLayoutRows(worksheet: Worksheet): LayoutRow[] {
  const header = readHeader(worksheet);

  const itemColumn = header.get("Item");
  if (itemColumn === undefined) {
    throw new MissingColumnError("Item", "'Item' column not found");
  }
  for (const column of REQUIRED_COLUMNS) {
    if (!header.has(column)) {
      throw new MissingColumnError(column, `Missing expected column: ${column}`);
    }
  }

  const rows: LayoutRow[] = [];
  let currentItem: string | undefined;

  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    currentItem = cellText(worksheet, rowNumber, itemColumn) ?? currentItem;
    rows.push({
      rowNumber,
      item: currentItem,
      field: cellText(worksheet, rowNumber, header.get("Field")),
      size: cellText(worksheet, rowNumber, header.get("Size")),
      position: cellText(worksheet, rowNumber, header.get("Position")),
    });
  }

  return rows;
}

export function convertLayoutWorkbook(workbook: Workbook, logger?: WorkflowLogger): LayoutDocument {
  const fn = "convertLayoutWorkbook";
  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new LayoutSheetError("Workbook has no worksheets");
  }

  const rows = readLayoutRows(worksheet);
  const complete = rows.filter(
    (row) => row.field !== undefined && row.size !== undefined && row.position !== undefined,
  );

  const dropped = rows.length - complete.length;
  if (dropped > 0) {
    logger?.logInfo(fn, `Dropped ${dropped} rows due to missing values in ${REQUIRED_COLUMNS.join(", ")}`, {
      sheet: worksheet.name,
    });
  }

  const detail: Record<string, LayoutField> = {};
  complete.forEach((row, index) => {
    const size = row.size ?? "";
    if (!INTEGER_PATTERN.test(size)) {
      logger?.logWarn(fn, `Error processing row ${index}: size is not an integer`, {
        rowNumber: row.rowNumber,
        item: row.item,
        size,
      });
      return;
    }

    detail[String(index + 1)] = {
      fieldName: (row.field ?? "").trim().replace(/[ ()-]/g, ""),
      dataType: "string",
      size: parseInt(size.trim(), 10),
      pos: (row.position ?? "").trim(),
    };
  });

  logger?.logDebug(fn, `Converted ${Object.keys(detail).length} fields`, { sheet: worksheet.name });
  return { detail };
}

/**
 * Reads the first worksheet of an .xlsx file.
 */
export async function convertLayoutSheet(filePath: string, logger?: WorkflowLogger): Promise<LayoutDocument> {
  const workbook = new Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new LayoutSheetError(`Unable to read workbook ${filePath}`, {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return convertLayoutWorkbook(workbook, logger);
}
