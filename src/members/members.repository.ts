/**
 * @fileoverview Members Repository
 *
 * Data access layer for member records in the Members sheet.
 *
 * @remarks
 * The sheet is the source of truth and is read whole on every call; the
 * portal keeps no copy between sessions. Rows the administrator needs to fix
 * are logged with their row number and MemberID.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SpreadsheetSession } from '../shared/sheets';
import { formatRowIssue } from '../shared/tables';
import { Member, MemberRoster } from './interfaces';
import { normalizeEmail, parseMemberTable } from './member-table';

@Injectable()
export class MembersRepository {
    private readonly logger = new Logger(MembersRepository.name);

    constructor(private configService: ConfigService) { }

    private get sheetKey(): string {
        return this.configService.getOrThrow<string>('MEMBERS_SHEET_KEY');
    }

    /**
     * Loads every usable member from the sheet, along with the emails of
     * the rows that had to be left out.
     *
     * @throws TableShapeError when a required column is missing
     */
    async loadRoster(session: SpreadsheetSession): Promise<MemberRoster> {
        const table = await session.readTable(this.sheetKey);
        const { members, issues, excludedEmails } = parseMemberTable(table);

        if (issues.length > 0) {
            this.logger.warn({
                msg: 'Member rows need attention',
                count: issues.length,
                issues: issues.map(formatRowIssue),
            });
        }

        return { members, excludedEmails };
    }

    /**
     * Finds the member a session token was issued to.
     *
     * @returns The member whose MemberID and email both still match, null otherwise
     */
    async findForSession(session: SpreadsheetSession, memberId: string, email: string): Promise<Member | null> {
        const { members } = await this.loadRoster(session);
        const wanted = normalizeEmail(email);

        return members.find((member) => member.memberId === memberId && normalizeEmail(member.email) === wanted) ?? null;
    }
}
