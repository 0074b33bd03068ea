/**
 * @fileoverview Requests Repository
 *
 * Data access layer for the Requests sheet.
 *
 * @remarks
 * Rows are laid out by the sheet's own header, so the administrator may
 * reorder columns or add extra ones; extra columns are written empty.
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SpreadsheetSession } from '../shared/sheets';
import { Table, TableRow, TableShapeError, cellValue, findMissingColumns } from '../shared/tables';
import { LeaveRequestRecord, REQUEST_COLUMNS, REQUIRED_REQUEST_COLUMNS } from './interfaces';

function assertRequestColumns(table: Table): void {
    const missing = findMissingColumns(table.header, REQUIRED_REQUEST_COLUMNS);
    if (missing.length > 0) {
        throw new TableShapeError('Requests', missing);
    }
}

function fromRow(row: TableRow): LeaveRequestRecord {
    return {
        timestamp: cellValue(row, REQUEST_COLUMNS.timestamp),
        memberEmail: cellValue(row, REQUEST_COLUMNS.memberEmail),
        memberId: cellValue(row, REQUEST_COLUMNS.memberId),
        requestType: cellValue(row, REQUEST_COLUMNS.requestType),
        message: cellValue(row, REQUEST_COLUMNS.message),
        status: cellValue(row, REQUEST_COLUMNS.status),
        handledBy: cellValue(row, REQUEST_COLUMNS.handledBy),
        adminNotes: cellValue(row, REQUEST_COLUMNS.adminNotes),
    };
}

/**
 * Orders a record's values by the sheet header.
 */
export function toRowValues(header: readonly string[], record: LeaveRequestRecord): string[] {
    const byColumn = new Map<string, string>([
        [REQUEST_COLUMNS.timestamp, record.timestamp],
        [REQUEST_COLUMNS.memberEmail, record.memberEmail],
        [REQUEST_COLUMNS.memberId, record.memberId],
        [REQUEST_COLUMNS.requestType, record.requestType],
        [REQUEST_COLUMNS.message, record.message],
        [REQUEST_COLUMNS.status, record.status],
        [REQUEST_COLUMNS.handledBy, record.handledBy],
        [REQUEST_COLUMNS.adminNotes, record.adminNotes],
    ]);
    return header.map((column) => byColumn.get(column) ?? '');
}

@Injectable()
export class RequestsRepository {
    constructor(private configService: ConfigService) { }

    private get sheetKey(): string {
        return this.configService.getOrThrow<string>('REQUESTS_SHEET_KEY');
    }

    /**
     * Appends one request row.
     *
     * @throws TableShapeError when a required column is missing
     */
    async append(session: SpreadsheetSession, record: LeaveRequestRecord): Promise<void> {
        const table = await session.readTable(this.sheetKey);
        assertRequestColumns(table);

        await session.appendRow(this.sheetKey, toRowValues(table.header, record));
    }

    /**
     * Returns a member's requests in sheet order.
     */
    async findByMember(session: SpreadsheetSession, memberId: string): Promise<LeaveRequestRecord[]> {
        const table = await session.readTable(this.sheetKey);
        assertRequestColumns(table);

        return table.rows
            .filter((row) => cellValue(row, REQUEST_COLUMNS.memberId).trim() === memberId)
            .map(fromRow);
    }
}
