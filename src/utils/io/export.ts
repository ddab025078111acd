/**
 * Excel Export
 *
 * Writes record tables to single-sheet workbooks:
 * - Frozen, bold header row
 * - Wrapped text in long columns, with row heights estimated from content
 * - Lists joined by "; ", structured values as JSON, absent values as empty cells
 */

import { dirname } from "path";

import Excel from "exceljs";

import { logger } from "../core/logger.js";

import { ensureFolder } from "./file.js";

const { Workbook } = Excel;

export interface TableColumn<T> {
    header: string;
    key: keyof T & string;
    /** Column width in characters */
    width: number;
    /** Wrap long text and grow the row to fit */
    wrap?: boolean;
}

/**
 * Calculate appropriate Excel row height based on content
 *
 * Uses 15 pixels per wrapped line as base height.
 *
 * @param width - Column width in characters
 */
export const getRowHeight = (content: string, width: number) =>
    content
        .split("\n")
        .map((text) => Math.max(1, Math.ceil(text.length / width)))
        .reduce((acc, cur) => acc + cur) *
        15 +
    3;

/** Spreadsheet cell for an arbitrary field value. */
export const toCell = (value: unknown): string | number | boolean => {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        return value;
    }
    if (value === undefined || value === null) {
        return "";
    }
    if (Array.isArray(value)) {
        return value.map((item) => (typeof item === "string" ? item : JSON.stringify(item))).join("; ");
    }
    return JSON.stringify(value);
};

const FONT = { name: "Lato", family: 4, size: 12 };

/** Build a one-sheet workbook from records. */
export const buildTableWorkbook = <T extends object>(
    name: string,
    columns: TableColumn<T>[],
    rows: T[],
) => {
    const book = new Workbook();
    const sheet = book.addWorksheet(name, {
        views: [{ state: "frozen", xSplit: 0, ySplit: 1 }],
    });
    sheet.columns = columns.map(({ header, key, width }) => ({ header, key, width }));
    sheet.getRow(1).alignment = { vertical: "middle", wrapText: true };
    sheet.getRow(1).font = { ...FONT, bold: true };
    sheet.properties.defaultRowHeight = 18;

    for (const row of rows) {
        const values: Record<string, string | number | boolean> = {};
        for (const column of columns) {
            values[column.key] = toCell(row[column.key]);
        }
        const added = sheet.addRow(values);
        added.font = FONT;
        added.alignment = { vertical: "middle" };

        let height = 18;
        for (const column of columns.filter((column) => column.wrap)) {
            added.getCell(column.key).alignment = { vertical: "middle", wrapText: true };
            height = Math.max(height, getRowHeight(String(values[column.key]), column.width));
        }
        added.height = height;
    }
    return book;
};

/**
 * Write records to an .xlsx file, creating its folder
 *
 * @returns The written path
 */
export const exportTable = <T extends object>(
    path: string,
    columns: TableColumn<T>[],
    rows: T[],
    sheetName = "Sheet1",
) =>
    logger.withSource("exportTable", async () => {
        ensureFolder(dirname(path));
        const book = buildTableWorkbook(sheetName, columns, rows);
        await book.xlsx.writeFile(path);
        logger.debug(`Wrote ${rows.length} rows to ${path}`);
        return path;
    });
