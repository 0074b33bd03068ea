import Papa from 'papaparse';
import { Table, cellValue, toTable } from '../shared/tables';

export class CsvFormatError extends Error {
    constructor(readonly problems: string[]) {
        super(`Malformed CSV: ${problems.join('; ')}`);
        this.name = 'CsvFormatError';
    }
}

/**
 * Finds cells a header-keyed table could not hold: values under a blank
 * header, a repeated header name, and values past the last header.
 */
function layoutProblems(grid: readonly string[][]): string[] {
    const [headerRow = [], ...dataRows] = grid;
    const problems: string[] = [];
    const seen = new Set<string>();

    headerRow.forEach((cell, position) => {
        const name = cell.trim();
        if (!name) {
            if (dataRows.some((row) => (row[position] ?? '').trim() !== '')) {
                problems.push(`column ${position + 1} has no header`);
            }
        } else if (seen.has(name)) {
            problems.push(`duplicate column ${name}`);
        } else {
            seen.add(name);
        }
    });

    dataRows.forEach((row, index) => {
        if (row.slice(headerRow.length).some((cell) => cell.trim() !== '')) {
            problems.push(`row ${index + 2} has values beyond the last column`);
        }
    });

    return problems;
}

/**
 * Parses CSV text with a header row. Every value stays text, so PINs keep
 * their leading zeros.
 *
 * @throws CsvFormatError when the text is malformed or a cell would not
 *         survive being keyed by its header
 */
export function parseCsv(text: string): Table {
    const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
        delimiter: ',',
        skipEmptyLines: false,
    });

    if (result.errors.length > 0) {
        throw new CsvFormatError(result.errors.map((error) => (
            error.row === undefined ? error.message : `row ${error.row + 1}: ${error.message}`
        )));
    }

    const problems = layoutProblems(result.data);
    if (problems.length > 0) {
        throw new CsvFormatError(problems);
    }

    return toTable(result.data);
}

export function formatCsv(table: Table): string {
    const data = table.rows.map((row) => table.header.map((column) => cellValue(row, column)));
    return `${Papa.unparse({ fields: table.header, data }, { newline: '\n' })}\n`;
}
