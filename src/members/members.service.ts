import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { SPREADSHEET_STORE, SpreadsheetStore, withStoreSession } from '../shared/sheets';
import { AuthenticatedMember } from '../auth/interfaces';
import { MembersRepository } from './members.repository';
import { LeaveSummaryDto, toLeaveSummary } from './dto';

export const STALE_SESSION_MESSAGE = 'Your member record has changed. Please log in again.';

@Injectable()
export class MembersService {
    constructor(
        @Inject(SPREADSHEET_STORE) private store: SpreadsheetStore,
        private membersRepository: MembersRepository,
    ) { }

    /**
     * Returns the caller's current leave figures, read fresh from the sheet.
     */
    async getLeaveSummary(user: AuthenticatedMember): Promise<LeaveSummaryDto> {
        const member = await withStoreSession(this.store, (session) =>
            this.membersRepository.findForSession(session, user.memberId, user.email),
        );

        if (!member) {
            throw new UnauthorizedException(STALE_SESSION_MESSAGE);
        }

        return toLeaveSummary(member);
    }
}
