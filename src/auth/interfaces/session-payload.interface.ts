/**
 * @fileoverview Session Token Interfaces
 *
 * Claims carried by a portal access token and the identity handlers receive.
 */

/**
 * JWT claims issued at login.
 */
export interface SessionPayload {
    /** Subject claim - MemberID */
    sub: string;

    /** Normalized (trimmed, lowercase) email the member logged in with */
    email: string;

    /** Standard JWT claims */
    iat?: number;
    exp?: number;
    iss?: string;
}

/**
 * Member identity attached to authenticated requests.
 *
 * @remarks
 * Populated by JwtStrategy.validate() and available via `@Request() req.user`.
 * Handlers re-read the Members sheet with it rather than trusting any cached row.
 */
export interface AuthenticatedMember {
    memberId: string;
    email: string;
}
