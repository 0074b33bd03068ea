/**
 * @fileoverview Spreadsheet Store Errors
 *
 * Upstream failures are surfaced to the caller with the service's own message
 * and a hint about what to check. Nothing here retries.
 */

export class SpreadsheetStoreError extends Error {
    constructor(
        message: string,
        readonly status?: number,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'SpreadsheetStoreError';
    }
}

function numericStatus(value: unknown): number | undefined {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && /^\d{3}$/.test(value)) return Number(value);
    return undefined;
}

/**
 * Reads the HTTP status off an API client error (`status`, `response.status` or `code`).
 */
export function upstreamStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;

    if ('status' in error) {
        const status = numericStatus(error.status);
        if (status !== undefined) return status;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response) {
        const status = numericStatus(error.response.status);
        if (status !== undefined) return status;
    }
    if ('code' in error) return numericStatus(error.code);
    return undefined;
}

export function toStoreError(error: unknown, sheetKey: string): SpreadsheetStoreError {
    if (error instanceof SpreadsheetStoreError) return error;

    const status = upstreamStatus(error);
    const detail = error instanceof Error ? error.message : String(error);

    switch (status) {
        case 401:
        case 403:
            return new SpreadsheetStoreError(
                `Permission denied for sheet ${sheetKey}: ${detail}. `
                + 'Share the sheet with the service account email and try again.',
                status,
                { cause: error },
            );
        case 404:
            return new SpreadsheetStoreError(
                `Sheet ${sheetKey} was not found: ${detail}. Check the configured sheet key.`,
                status,
                { cause: error },
            );
        default:
            return new SpreadsheetStoreError(
                `Spreadsheet service unreachable: ${detail}. Try again shortly.`,
                status,
                { cause: error },
            );
    }
}
