/**
 * @fileoverview JWT Authentication Strategy
 *
 * Passport.js JWT strategy for validating portal session tokens.
 *
 * @remarks
 * Token flow:
 * 1. Member logs in via POST /auth/login and receives a Bearer token
 * 2. Passport extracts and validates the JWT (HS256, issuer, expiry)
 * 3. validate() turns the claims into an AuthenticatedMember
 * 4. The member is attached to the request for downstream handlers
 */

import { Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AuthenticatedMember, SessionPayload } from './interfaces';

export const DEFAULT_JWT_ISSUER = 'member-leave-portal';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
    constructor(configService: ConfigService) {
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
            issuer: configService.get<string>('JWT_ISSUER') ?? DEFAULT_JWT_ISSUER,
            algorithms: ['HS256'],
        });
    }

    validate(payload: SessionPayload): AuthenticatedMember {
        return {
            memberId: payload.sub,
            email: payload.email,
        };
    }
}
