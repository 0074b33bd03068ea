/**
 * A table lacks columns the caller cannot substitute a default for.
 */
export class TableShapeError extends Error {
    constructor(
        readonly table: string,
        readonly missingColumns: string[],
    ) {
        super(`${table} table is missing columns: ${missingColumns.join(', ')}`);
        this.name = 'TableShapeError';
    }
}

/**
 * Problems found on one row, with enough context for an operator to fix it.
 */
export interface RowIssue {
    rowNumber: number;
    memberId?: string;
    errors: string[];
}

export function formatRowIssue(issue: RowIssue): string {
    const where = issue.memberId
        ? `row ${issue.rowNumber} (${issue.memberId})`
        : `row ${issue.rowNumber}`;
    return `${where}: ${issue.errors.join(', ')}`;
}

export class RowValidationError extends Error {
    constructor(
        readonly table: string,
        readonly issues: RowIssue[],
    ) {
        const noun = issues.length === 1 ? 'row' : 'rows';
        super(`${table} table has ${issues.length} invalid ${noun}: ${issues.map(formatRowIssue).join('; ')}`);
        this.name = 'RowValidationError';
    }
}
