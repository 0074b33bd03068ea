/**
 * @fileoverview Member Authentication
 *
 * Matches a submitted email and PIN against the loaded member records.
 *
 * @remarks
 * The outcome names why a login failed so it can be logged and counted.
 * Callers must not show that reason to the member.
 */

import { verifyPin } from '../credentials';
import { Member, MemberRoster, normalizeEmail } from '../members';

export type AuthenticationFailure = 'not_found' | 'ambiguous' | 'no_credential' | 'mismatch';

export type AuthenticationOutcome =
    | { ok: true; member: Member }
    | { ok: false; reason: AuthenticationFailure };

/**
 * Authenticates a member by email (case-insensitive) and PIN.
 *
 * Two rows sharing the email is a failure, never a guess at which one was
 * meant, even when one of them was excluded from the roster.
 */
export function authenticateMember(
    { members, excludedEmails }: MemberRoster,
    email: string,
    pin: string,
    salt: string,
): AuthenticationOutcome {
    const wanted = normalizeEmail(email);
    if (!wanted) return { ok: false, reason: 'not_found' };

    const matches = members.filter((member) => normalizeEmail(member.email) === wanted);
    const excludedMatches = excludedEmails.filter((excluded) => excluded === wanted).length;
    if (matches.length + excludedMatches > 1) return { ok: false, reason: 'ambiguous' };
    if (matches.length === 0) return { ok: false, reason: 'not_found' };

    const [member] = matches;
    if (!member.credential) return { ok: false, reason: 'no_credential' };
    if (!verifyPin(member.credential, pin, salt)) return { ok: false, reason: 'mismatch' };

    return { ok: true, member };
}
