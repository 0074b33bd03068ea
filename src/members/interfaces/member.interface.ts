/**
 * @fileoverview Member Interface
 *
 * Defines the structure of member records as loaded from the Members sheet.
 */

import { MemberCredential } from '../../credentials';

/**
 * Member record as maintained by the administrator.
 *
 * @remarks
 * - email: login key, matched case-insensitively
 * - leaveBalance: stored as entered; it is not derived from allowance and taken
 * - credential: null when the row has neither a PIN nor a PIN hash
 */
export interface Member {
    /** Unique member identifier (MemberID) */
    memberId: string;

    memberName: string;

    email: string;

    leaveYear: string;

    /** Leave figures, null when the cell is blank */
    annualAllowance: number | null;
    leaveTaken: number | null;
    leaveBalance: number | null;

    /** As written in the sheet */
    lastUpdated: string;

    /** Administrator notes, never shown to the member */
    notes: string;

    credential: MemberCredential | null;

    /** Sheet row the record came from */
    rowNumber: number;
}

/**
 * Usable members plus the login emails of rows that were excluded.
 *
 * @remarks
 * An excluded row still claims its email: a login matching it alongside a
 * usable row is ambiguous, not a match for the usable one.
 */
export interface MemberRoster {
    members: Member[];

    /** Normalised, non-empty emails of rows left out of `members` */
    excludedEmails: string[];
}
