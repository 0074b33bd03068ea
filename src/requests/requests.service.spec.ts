/**
 * @fileoverview Requests Service Tests
 */

import { Logger, UnauthorizedException } from '@nestjs/common';
import { MembersRepository, STALE_SESSION_MESSAGE } from '../members';
import { SpreadsheetStoreError } from '../shared/sheets';
import { InMemorySpreadsheetStore } from '../../test/support/in-memory-spreadsheet.store';
import { membersGrid, requestsGrid, stubConfig } from '../../test/support/fixtures';
import { RequestsRepository } from './requests.repository';
import { RequestsService } from './requests.service';

describe('RequestsService', () => {
    const sam = { memberId: 'M001', email: 'sam@example.com' };
    const submittedAt = new Date('2026-03-01T00:30:00Z');

    let store: InMemorySpreadsheetStore;
    let service: RequestsService;

    beforeEach(() => {
        jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
        jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

        store = new InMemorySpreadsheetStore();
        store.setSheet('members-sheet', membersGrid());
        store.setSheet('requests-sheet', requestsGrid());

        const configService = stubConfig();
        service = new RequestsService(
            store,
            new MembersRepository(configService),
            new RequestsRepository(configService),
            configService,
        );
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('formatTimestamp', () => {
        it('should format in the portal time zone', () => {
            expect(service.formatTimestamp(submittedAt)).toBe('2026-03-01 11:30:00');
        });

        it('should follow daylight saving changes', () => {
            expect(service.formatTimestamp(new Date('2026-07-01T00:30:00Z'))).toBe('2026-07-01 10:30:00');
        });
    });

    describe('submit', () => {
        it('should append one row with status New for the logged-in member', async () => {
            const record = await service.submit(sam, { requestType: 'Leave balance query', message: 'March is missing' }, submittedAt);

            expect(record).toEqual({
                timestamp: '2026-03-01 11:30:00',
                memberEmail: 'sam@example.com',
                memberId: 'M001',
                requestType: 'Leave balance query',
                message: 'March is missing',
                status: 'New',
                handledBy: '',
                adminNotes: '',
            });

            const grid = store.grid('requests-sheet');
            expect(grid).toHaveLength(4);
            expect(grid[3]).toEqual([
                '2026-03-01 11:30:00', 'sam@example.com', 'M001', 'Leave balance query', 'March is missing', 'New', '', '',
            ]);
        });

        it('should record the email as written in the member table', async () => {
            const record = await service.submit(
                { memberId: 'M002', email: 'alex@example.com' },
                { requestType: 'Contact change', message: '' },
                submittedAt,
            );

            expect(record.memberEmail).toBe('Alex@Example.com');
            expect(record.message).toBe('');
        });

        it('should reject a stale session without writing', async () => {
            const attempt = service.submit({ memberId: 'M001', email: 'old@example.com' }, { requestType: 'Other', message: 'hi' });

            await expect(attempt).rejects.toBeInstanceOf(UnauthorizedException);
            await expect(attempt).rejects.toThrow(STALE_SESSION_MESSAGE);
            expect(store.grid('requests-sheet')).toHaveLength(3);
        });

        it('should use one store session and close it on failure', async () => {
            store.failWith = new SpreadsheetStoreError('Spreadsheet service unreachable: timeout. Try again shortly.');

            await expect(service.submit(sam, { requestType: 'Other', message: 'hi' })).rejects.toThrow(SpreadsheetStoreError);
            expect(store.opened).toBe(1);
            expect(store.closed).toBe(1);
        });
    });

    describe('listForMember', () => {
        it('should return the member requests with their current status', async () => {
            const requests = await service.listForMember(sam);

            expect(requests.map((request) => [request.message, request.status])).toEqual([['New address', 'Done']]);
        });
    });
});
