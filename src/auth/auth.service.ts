import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as jwt from 'jsonwebtoken';
import { Counter } from 'prom-client';
import { SPREADSHEET_STORE, SpreadsheetStore, withStoreSession } from '../shared/sheets';
import { Member, MembersRepository, normalizeEmail, toLeaveSummary } from '../members';
import { authenticateMember } from './member-authenticator';
import { LoginDto, LoginResponseDto } from './dto';
import { SessionPayload } from './interfaces';
import { DEFAULT_JWT_ISSUER } from './jwt.strategy';

const loginCounter = new Counter({
    name: 'portal_login_attempts_total',
    help: 'Total number of login attempts',
    labelNames: ['outcome'],
});

/** Shown for every rejected login, whatever the reason */
export const LOGIN_REJECTED_MESSAGE = 'No match found. Check your email/PIN or contact the office.';

const DEFAULT_SESSION_TTL_SECONDS = 1800;

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);

    constructor(
        @Inject(SPREADSHEET_STORE) private store: SpreadsheetStore,
        private membersRepository: MembersRepository,
        private configService: ConfigService,
    ) { }

    private get sessionTtlSeconds(): number {
        return this.configService.get<number>('SESSION_TTL_SECONDS') ?? DEFAULT_SESSION_TTL_SECONDS;
    }

    /**
     * Checks an email and PIN against the Members sheet and opens a session.
     *
     * @throws UnauthorizedException with the same message for every failure reason
     */
    async login(credentials: LoginDto): Promise<LoginResponseDto> {
        const roster = await withStoreSession(this.store, (session) => this.membersRepository.loadRoster(session));
        const salt = this.configService.get<string>('PIN_SALT') ?? '';

        const outcome = authenticateMember(roster, credentials.email, credentials.pin, salt);
        if (!outcome.ok) {
            loginCounter.inc({ outcome: outcome.reason });
            this.logger.warn({ msg: 'Login rejected', reason: outcome.reason });
            throw new UnauthorizedException(LOGIN_REJECTED_MESSAGE);
        }

        loginCounter.inc({ outcome: 'success' });
        this.logger.log({ msg: 'Member logged in', memberId: outcome.member.memberId });

        return {
            accessToken: this.issueToken(outcome.member),
            expiresIn: this.sessionTtlSeconds,
            member: toLeaveSummary(outcome.member),
        };
    }

    private issueToken(member: Member): string {
        const payload: SessionPayload = {
            sub: member.memberId,
            email: normalizeEmail(member.email),
        };

        return jwt.sign(payload, this.configService.getOrThrow<string>('JWT_SECRET'), {
            algorithm: 'HS256',
            issuer: this.configService.get<string>('JWT_ISSUER') ?? DEFAULT_JWT_ISSUER,
            expiresIn: this.sessionTtlSeconds,
        });
    }
}
