import { SpreadsheetSession, SpreadsheetStore, withStoreSession } from './spreadsheet-store.interface';
import { SpreadsheetStoreError, toStoreError, upstreamStatus } from './spreadsheet-store.error';

describe('withStoreSession', () => {
    let session: SpreadsheetSession;
    let store: SpreadsheetStore;

    beforeEach(() => {
        session = {
            readTable: jest.fn(),
            appendRow: jest.fn(),
            close: jest.fn().mockResolvedValue(undefined),
        };
        store = { openSession: jest.fn().mockResolvedValue(session) };
    });

    it('should close the session after the work resolves', async () => {
        await expect(withStoreSession(store, async () => 'done')).resolves.toBe('done');

        expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('should close the session when the work throws', async () => {
        const failure = new Error('boom');

        await expect(withStoreSession(store, async () => { throw failure; })).rejects.toBe(failure);
        expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('should not run the work when no session can be opened', async () => {
        const work = jest.fn();
        store.openSession = jest.fn().mockRejectedValue(new SpreadsheetStoreError('offline'));

        await expect(withStoreSession(store, work)).rejects.toThrow('offline');
        expect(work).not.toHaveBeenCalled();
    });
});

describe('upstreamStatus', () => {
    it('should read status, response.status or a numeric code', () => {
        expect(upstreamStatus({ status: 404 })).toBe(404);
        expect(upstreamStatus({ response: { status: 403 } })).toBe(403);
        expect(upstreamStatus({ code: '401' })).toBe(401);
    });

    it('should ignore non-HTTP codes', () => {
        expect(upstreamStatus({ code: 'ECONNRESET' })).toBeUndefined();
        expect(upstreamStatus('nope')).toBeUndefined();
        expect(upstreamStatus(null)).toBeUndefined();
    });
});

describe('toStoreError', () => {
    it('should hint at the sheet key when a sheet is not found', () => {
        const error = toStoreError(Object.assign(new Error('Requested entity was not found'), { code: 404 }), 'members-sheet');

        expect(error.status).toBe(404);
        expect(error.message).toBe(
            'Sheet members-sheet was not found: Requested entity was not found. Check the configured sheet key.',
        );
    });

    it('should report other failures as the service being unreachable', () => {
        const cause = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
        const error = toStoreError(cause, 'members-sheet');

        expect(error.status).toBeUndefined();
        expect(error.message).toBe('Spreadsheet service unreachable: socket hang up. Try again shortly.');
        expect(error.cause).toBe(cause);
    });

    it('should pass store errors through unchanged', () => {
        const original = new SpreadsheetStoreError('already explained', 502);

        expect(toStoreError(original, 'members-sheet')).toBe(original);
    });
});
