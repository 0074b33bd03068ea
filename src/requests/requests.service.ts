import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { formatInTimeZone } from 'date-fns-tz';
import { Counter } from 'prom-client';
import { SPREADSHEET_STORE, SpreadsheetSession, SpreadsheetStore, withStoreSession } from '../shared/sheets';
import { Member, MembersRepository, STALE_SESSION_MESSAGE } from '../members';
import { AuthenticatedMember } from '../auth/interfaces';
import { RequestsRepository } from './requests.repository';
import { CreateRequestDto } from './dto';
import { INITIAL_REQUEST_STATUS, LeaveRequestRecord } from './interfaces';

const submittedCounter = new Counter({
    name: 'portal_requests_submitted_total',
    help: 'Total number of update requests submitted',
    labelNames: ['request_type'],
});

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const DEFAULT_TIMEZONE = 'Australia/Sydney';

@Injectable()
export class RequestsService {
    private readonly logger = new Logger(RequestsService.name);

    constructor(
        @Inject(SPREADSHEET_STORE) private store: SpreadsheetStore,
        private membersRepository: MembersRepository,
        private requestsRepository: RequestsRepository,
        private configService: ConfigService,
    ) { }

    private async requireMember(session: SpreadsheetSession, user: AuthenticatedMember): Promise<Member> {
        const member = await this.membersRepository.findForSession(session, user.memberId, user.email);
        if (!member) {
            throw new UnauthorizedException(STALE_SESSION_MESSAGE);
        }
        return member;
    }

    formatTimestamp(at: Date): string {
        const timeZone = this.configService.get<string>('PORTAL_TIMEZONE') ?? DEFAULT_TIMEZONE;
        return formatInTimeZone(at, timeZone, TIMESTAMP_FORMAT);
    }

    /**
     * Appends a request for the logged-in member with status New.
     *
     * @param submittedAt - Submission time written to the Timestamp column
     */
    async submit(user: AuthenticatedMember, request: CreateRequestDto, submittedAt = new Date()): Promise<LeaveRequestRecord> {
        return withStoreSession(this.store, async (session) => {
            const member = await this.requireMember(session, user);

            const record: LeaveRequestRecord = {
                timestamp: this.formatTimestamp(submittedAt),
                memberEmail: member.email,
                memberId: member.memberId,
                requestType: request.requestType,
                message: request.message,
                status: INITIAL_REQUEST_STATUS,
                handledBy: '',
                adminNotes: '',
            };

            await this.requestsRepository.append(session, record);

            submittedCounter.inc({ request_type: request.requestType });
            this.logger.log({ msg: 'Request submitted', memberId: member.memberId, requestType: request.requestType });

            return record;
        });
    }

    /**
     * Lists the logged-in member's requests with their current status.
     */
    async listForMember(user: AuthenticatedMember): Promise<LeaveRequestRecord[]> {
        return withStoreSession(this.store, async (session) => {
            const member = await this.requireMember(session, user);
            return this.requestsRepository.findByMember(session, member.memberId);
        });
    }
}
