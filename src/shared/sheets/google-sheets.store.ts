/**
 * @fileoverview Google Sheets Store
 *
 * SpreadsheetStore backed by the Google Sheets v4 API and a service account.
 *
 * @remarks
 * Each spreadsheet is addressed by its key (the id in its URL) and only its
 * first worksheet is used. Values are read as formatted text, so numbers and
 * dates arrive exactly as the administrator sees them. Appends use RAW input
 * so member-supplied text is never interpreted as a formula.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import { google, sheets_v4 } from 'googleapis';
import { ServiceAccountCredentials } from '../../config/config.module';
import { Table, toTable } from '../tables';
import { SpreadsheetSession, SpreadsheetStore } from './spreadsheet-store.interface';
import { SpreadsheetStoreError, toStoreError } from './spreadsheet-store.error';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

const tracer = trace.getTracer('member-leave-portal.sheets');

/** Quotes a worksheet title for use as an A1 range */
function quoteTitle(title: string): string {
    return `'${title.replace(/'/g, "''")}'`;
}

export class GoogleSheetsSession implements SpreadsheetSession {
    private client: sheets_v4.Sheets | null;
    private readonly ranges = new Map<string, string>();

    constructor(client: sheets_v4.Sheets) {
        this.client = client;
    }

    async readTable(sheetKey: string): Promise<Table> {
        const client = this.requireClient();
        return this.traced('readTable', sheetKey, async () => {
            const range = await this.firstWorksheet(client, sheetKey);
            const response = await client.spreadsheets.values.get({
                spreadsheetId: sheetKey,
                range,
                valueRenderOption: 'FORMATTED_VALUE',
            });
            return toTable(response.data.values ?? []);
        });
    }

    async appendRow(sheetKey: string, values: string[]): Promise<void> {
        const client = this.requireClient();
        await this.traced('appendRow', sheetKey, async () => {
            const range = await this.firstWorksheet(client, sheetKey);
            await client.spreadsheets.values.append({
                spreadsheetId: sheetKey,
                range,
                valueInputOption: 'RAW',
                insertDataOption: 'INSERT_ROWS',
                requestBody: { values: [values] },
            });
        });
    }

    async close(): Promise<void> {
        this.client = null;
        this.ranges.clear();
    }

    /** Wraps one API call in a span and converts its failure into a SpreadsheetStoreError */
    private traced<T>(operation: string, sheetKey: string, work: () => Promise<T>): Promise<T> {
        return tracer.startActiveSpan(`sheets.${operation}`, async (span) => {
            span.setAttribute('sheets.key', sheetKey);
            try {
                return await work();
            } catch (error) {
                const storeError = toStoreError(error, sheetKey);
                span.recordException(storeError);
                span.setStatus({ code: SpanStatusCode.ERROR, message: storeError.message });
                throw storeError;
            } finally {
                span.end();
            }
        });
    }

    private requireClient(): sheets_v4.Sheets {
        if (!this.client) {
            throw new SpreadsheetStoreError('Spreadsheet session is already closed');
        }
        return this.client;
    }

    private async firstWorksheet(client: sheets_v4.Sheets, sheetKey: string): Promise<string> {
        const known = this.ranges.get(sheetKey);
        if (known) return known;

        const response = await client.spreadsheets.get({
            spreadsheetId: sheetKey,
            fields: 'sheets.properties.title',
        });
        const title = response.data.sheets?.[0]?.properties?.title;
        if (!title) {
            throw new SpreadsheetStoreError(`Spreadsheet ${sheetKey} has no worksheets`);
        }

        const range = quoteTitle(title);
        this.ranges.set(sheetKey, range);
        return range;
    }
}

@Injectable()
export class GoogleSheetsStore implements SpreadsheetStore {
    private readonly logger = new Logger(GoogleSheetsStore.name);

    constructor(private configService: ConfigService) { }

    async openSession(): Promise<SpreadsheetSession> {
        const credentials = this.configService.getOrThrow<ServiceAccountCredentials>('GOOGLE_SERVICE_ACCOUNT_JSON');

        const auth = new google.auth.GoogleAuth({
            credentials: {
                client_email: credentials.client_email,
                private_key: credentials.private_key,
            },
            scopes: SCOPES,
        });

        this.logger.debug({ msg: 'Spreadsheet session opened', serviceAccount: credentials.client_email });
        return new GoogleSheetsSession(google.sheets({ version: 'v4', auth }));
    }
}
