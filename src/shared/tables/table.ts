/**
 * @fileoverview Tabular Data
 *
 * Row/column tables shared by the spreadsheet store and the CSV tooling.
 * Every cell is text; typing happens where a table is parsed into records.
 */

/**
 * A single data row keyed by header name.
 *
 * @remarks
 * `rowNumber` is 1-based and counts the header line, so it matches the
 * row an operator sees in the spreadsheet or CSV file.
 */
export interface TableRow {
    rowNumber: number;
    cells: Record<string, string>;
}

export interface Table {
    header: string[];
    rows: TableRow[];
}

function cellText(cell: unknown): string {
    if (cell === null || cell === undefined) return '';
    return String(cell);
}

/**
 * Builds a table from raw grid values whose first row is the header.
 *
 * Header names are trimmed. Short rows read their missing cells as `''`,
 * fully blank rows are dropped and columns with an empty header are ignored.
 */
export function toTable(values: readonly (readonly unknown[])[]): Table {
    const [headerRow = [], ...dataRows] = values;
    const header = headerRow.map((cell) => cellText(cell).trim());
    const rows: TableRow[] = [];

    dataRows.forEach((row, index) => {
        const texts = row.map(cellText);
        if (texts.every((text) => text.trim() === '')) return;

        const cells: Record<string, string> = {};
        header.forEach((column, position) => {
            if (column) cells[column] = texts[position] ?? '';
        });
        rows.push({ rowNumber: index + 2, cells });
    });

    return { header, rows };
}

export function cellValue(row: TableRow, column: string): string {
    return row.cells[column] ?? '';
}

export function findMissingColumns(header: readonly string[], required: readonly string[]): string[] {
    return required.filter((column) => !header.includes(column));
}
