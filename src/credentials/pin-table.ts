/**
 * @fileoverview PIN Table Migration
 *
 * Rewrites a member table so that plaintext PINs are replaced by PIN hashes.
 */

import { RowIssue, RowValidationError, Table, TableRow, TableShapeError, cellValue, findMissingColumns } from '../shared/tables';
import { PIN_COLUMN, PIN_HASH_COLUMN, hashPin } from './pin-hash';

const REQUIRED_COLUMNS = ['MemberID', 'Email', PIN_COLUMN];

export interface PinHashResult {
    table: Table;

    /** Rows whose PIN was hashed */
    hashed: number;

    /** Rows without a PIN that already carried a hash */
    carriedOver: number;
}

function rowErrors(row: TableRow): string[] {
    const errors: string[] = [];
    if (!cellValue(row, 'MemberID').trim()) errors.push('MemberID is empty');
    if (!cellValue(row, 'Email').trim()) errors.push('Email is empty');
    if (!cellValue(row, PIN_COLUMN).trim() && !cellValue(row, PIN_HASH_COLUMN).trim()) {
        errors.push('PIN is empty');
    }
    return errors;
}

/**
 * Hashes every row's PIN with `salt` and drops the plaintext column.
 *
 * @throws TableShapeError when MemberID, Email or PIN is not a column
 * @throws RowValidationError listing every row that cannot be migrated;
 *         no partial table is produced
 *
 * @remarks
 * The PIN column is replaced in place by PIN_Hash. When the input already
 * has a PIN_Hash column, the PIN column is removed and rows with an empty
 * PIN keep their existing hash.
 */
export function hashPinTable(table: Table, salt: string): PinHashResult {
    const missing = findMissingColumns(table.header, REQUIRED_COLUMNS);
    if (missing.length > 0) {
        throw new TableShapeError('Members', missing);
    }

    const issues: RowIssue[] = [];
    for (const row of table.rows) {
        const errors = rowErrors(row);
        if (errors.length > 0) {
            const memberId = cellValue(row, 'MemberID').trim();
            issues.push({ rowNumber: row.rowNumber, memberId: memberId || undefined, errors });
        }
    }
    if (issues.length > 0) {
        throw new RowValidationError('Members', issues);
    }

    const header = table.header.includes(PIN_HASH_COLUMN)
        ? table.header.filter((column) => column !== PIN_COLUMN)
        : table.header.map((column) => (column === PIN_COLUMN ? PIN_HASH_COLUMN : column));

    let hashed = 0;
    let carriedOver = 0;

    const rows = table.rows.map((row): TableRow => {
        const { [PIN_COLUMN]: rawPin, ...rest } = row.cells;
        const pin = (rawPin ?? '').trim();

        if (pin) {
            hashed++;
            return { rowNumber: row.rowNumber, cells: { ...rest, [PIN_HASH_COLUMN]: hashPin(pin, salt) } };
        }

        carriedOver++;
        return { rowNumber: row.rowNumber, cells: { ...rest, [PIN_HASH_COLUMN]: cellValue(row, PIN_HASH_COLUMN).trim() } };
    });

    return { table: { header, rows }, hashed, carriedOver };
}
