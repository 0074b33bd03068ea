/**
 * @fileoverview PIN Hashing
 *
 * Salted SHA-256 digests of member PINs and their verification.
 *
 * @remarks
 * The salt is a single deployment-wide secret shared by the hashing tool and
 * the portal. There is no per-record salt: a stored hash is recomputed from
 * the submitted PIN at login, so the same (salt, PIN) pair must always give
 * the same digest.
 */

import { createHash, timingSafeEqual } from 'crypto';

export const PIN_COLUMN = 'PIN';
export const PIN_HASH_COLUMN = 'PIN_Hash';

/**
 * Credential of a member row, resolved once when the table is loaded.
 */
export type MemberCredential =
    | { kind: 'plaintext'; pin: string }
    | { kind: 'hashed'; hash: string };

/**
 * Lowercase hex SHA-256 of `salt + pin`.
 */
export function hashPin(pin: string, salt = ''): string {
    return createHash('sha256').update(salt + pin, 'utf8').digest('hex');
}

/**
 * Picks the credential from a row's PIN and PIN_Hash cells.
 * A populated hash wins over a plaintext PIN; a row with neither has none.
 */
export function resolveCredential(pinCell: string | undefined, hashCell: string | undefined): MemberCredential | null {
    const hash = (hashCell ?? '').trim();
    if (hash) return { kind: 'hashed', hash };

    const pin = (pinCell ?? '').trim();
    if (pin) return { kind: 'plaintext', pin };

    return null;
}

function constantTimeEquals(left: string, right: string): boolean {
    const a = Buffer.from(left, 'utf8');
    const b = Buffer.from(right, 'utf8');
    if (a.length !== b.length) return false;
    return timingSafeEqual(a, b);
}

export function verifyPin(credential: MemberCredential | null, submittedPin: string, salt: string): boolean {
    if (!credential) return false;

    const pin = submittedPin.trim();
    if (!pin) return false;

    switch (credential.kind) {
        case 'plaintext':
            return constantTimeEquals(pin, credential.pin);
        case 'hashed':
            return constantTimeEquals(hashPin(pin, salt), credential.hash.toLowerCase());
    }
}
