/**
 * @fileoverview Spreadsheet Store Contract
 *
 * The portal treats each spreadsheet as a whole table: it reads every row
 * and writes by appending. A session is acquired per unit of work and
 * always closed afterwards.
 */

import { Table } from '../tables';

/** Injection token for the active SpreadsheetStore implementation */
export const SPREADSHEET_STORE = Symbol('SPREADSHEET_STORE');

export interface SpreadsheetSession {
    /** Reads the first worksheet of the spreadsheet, header row first */
    readTable(sheetKey: string): Promise<Table>;

    /** Appends one row after the last populated row */
    appendRow(sheetKey: string, values: string[]): Promise<void>;

    close(): Promise<void>;
}

export interface SpreadsheetStore {
    openSession(): Promise<SpreadsheetSession>;
}

/**
 * Runs `work` inside a freshly acquired session and closes it afterwards,
 * whether `work` resolves or throws.
 */
export async function withStoreSession<T>(
    store: SpreadsheetStore,
    work: (session: SpreadsheetSession) => Promise<T>,
): Promise<T> {
    const session = await store.openSession();
    try {
        return await work(session);
    } finally {
        await session.close();
    }
}
