/**
 * @fileoverview Member Table Parsing
 *
 * Turns the raw Members sheet into typed member records.
 *
 * @remarks
 * Missing columns fail the whole load. Problems confined to a row exclude
 * that row (or, for a missing credential, only flag it) and are returned as
 * RowIssues so the caller can log them for the administrator.
 */

import { z } from 'zod';
import { PIN_COLUMN, PIN_HASH_COLUMN, resolveCredential } from '../credentials';
import { RowIssue, Table, TableShapeError, findMissingColumns } from '../shared/tables';
import { Member, MemberRoster } from './interfaces';

export const REQUIRED_MEMBER_COLUMNS = [
    'MemberID',
    'MemberName',
    'Email',
    'LeaveYear',
    'AnnualAllowance',
    'LeaveTaken',
    'LeaveBalance',
    'LastUpdated',
];

const leaveFigure = z
    .string()
    .trim()
    .transform((value, ctx): number | null => {
        if (value === '') return null;
        const parsed = Number(value.replace(/,/g, ''));
        if (!Number.isFinite(parsed)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a number' });
            return z.NEVER;
        }
        return parsed;
    });

// Validation schema for a member row; Notes may be absent from the sheet
const MemberRowSchema = z.object({
    MemberID: z.string().trim().min(1, 'must not be empty'),
    MemberName: z.string().trim(),
    Email: z.string().trim().min(1, 'must not be empty'),
    LeaveYear: z.string().trim(),
    AnnualAllowance: leaveFigure,
    LeaveTaken: leaveFigure,
    LeaveBalance: leaveFigure,
    LastUpdated: z.string().trim(),
    Notes: z.string().trim().default(''),
});

export interface MemberTableResult extends MemberRoster {
    issues: RowIssue[];
}

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

export function parseMemberTable(table: Table): MemberTableResult {
    const missing = findMissingColumns(table.header, REQUIRED_MEMBER_COLUMNS);
    if (!table.header.includes(PIN_COLUMN) && !table.header.includes(PIN_HASH_COLUMN)) {
        missing.push(`${PIN_COLUMN} or ${PIN_HASH_COLUMN}`);
    }
    if (missing.length > 0) {
        throw new TableShapeError('Members', missing);
    }

    const members: Member[] = [];
    const issues: RowIssue[] = [];
    const excludedEmails: string[] = [];

    for (const row of table.rows) {
        const result = MemberRowSchema.safeParse(row.cells);
        if (!result.success) {
            issues.push({
                rowNumber: row.rowNumber,
                memberId: row.cells.MemberID?.trim() || undefined,
                errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
            });

            const email = normalizeEmail(row.cells.Email ?? '');
            if (email) excludedEmails.push(email);
            continue;
        }

        const fields = result.data;
        const credential = resolveCredential(row.cells[PIN_COLUMN], row.cells[PIN_HASH_COLUMN]);
        if (!credential) {
            issues.push({
                rowNumber: row.rowNumber,
                memberId: fields.MemberID,
                errors: [`no ${PIN_COLUMN} or ${PIN_HASH_COLUMN} value`],
            });
        }

        members.push({
            memberId: fields.MemberID,
            memberName: fields.MemberName,
            email: fields.Email,
            leaveYear: fields.LeaveYear,
            annualAllowance: fields.AnnualAllowance,
            leaveTaken: fields.LeaveTaken,
            leaveBalance: fields.LeaveBalance,
            lastUpdated: fields.LastUpdated,
            notes: fields.Notes,
            credential,
            rowNumber: row.rowNumber,
        });
    }

    return { members, issues, excludedEmails };
}
