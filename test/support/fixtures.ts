import { ConfigService } from '@nestjs/config';

/** sha256('dojo-salt' + '482913') */
export const SAM_PIN_HASH = '47b4c124f12bf25f57e892083f109340ba7e10bafd6eb09f9f04e67fe994c3da';

export const MEMBER_HEADER = [
    'MemberID', 'MemberName', 'Email', 'LeaveYear', 'AnnualAllowance',
    'LeaveTaken', 'LeaveBalance', 'LastUpdated', 'PIN', 'PIN_Hash', 'Notes',
];

/**
 * M001 logs in with 482913 (hashed), M002 with 0042 (plaintext). M003 and
 * M004 share an email; M005 has no credential.
 */
export function membersGrid(): string[][] {
    return [
        MEMBER_HEADER,
        ['M001', 'Sam Rivera', 'sam@example.com', '2026', '4', '1', '3', '2026-09-30', '', SAM_PIN_HASH, 'owes fees'],
        ['M002', 'Alex Chen', 'Alex@Example.com', '2026', '6', '2', '4', '2026-09-28', '0042', '', ''],
        ['M003', 'Pat Lowe', 'twin@example.com', '2026', '4', '0', '4', '2026-09-01', '1111', '', ''],
        ['M004', 'Pat Lowe Jr', 'twin@example.com', '2026', '4', '0', '4', '2026-09-01', '2222', '', ''],
        ['M005', 'Ria Moss', 'ria@example.com', '2026', '4', '0', '4', '2026-09-01', '', '', ''],
    ];
}

export const REQUEST_HEADER = [
    'Timestamp', 'MemberEmail', 'MemberID', 'RequestType', 'Message', 'Status', 'HandledBy', 'AdminNotes',
];

export function requestsGrid(): string[][] {
    return [
        REQUEST_HEADER,
        ['2026-02-10 09:15:00', 'sam@example.com', 'M001', 'Other', 'New address', 'Done', 'Jo', 'updated'],
        ['2026-02-11 10:00:00', 'alex@example.com', 'M002', 'Billing question', 'Invoice?', 'New', '', ''],
    ];
}

export const TEST_CONFIG: Record<string, unknown> = {
    MEMBERS_SHEET_KEY: 'members-sheet',
    REQUESTS_SHEET_KEY: 'requests-sheet',
    PIN_SALT: 'dojo-salt',
    JWT_SECRET: 'test-secret',
    JWT_ISSUER: 'member-leave-portal',
    SESSION_TTL_SECONDS: 1800,
    PORTAL_TIMEZONE: 'Australia/Sydney',
};

/**
 * ConfigService stand-in reading from a fixed map.
 */
export function stubConfig(overrides: Record<string, unknown> = {}): ConfigService {
    const values: Record<string, unknown> = { ...TEST_CONFIG, ...overrides };
    return {
        get: jest.fn((key: string) => values[key]),
        getOrThrow: jest.fn((key: string) => {
            if (values[key] === undefined) {
                throw new TypeError(`Configuration key "${key}" does not exist`);
            }
            return values[key];
        }),
    } as unknown as ConfigService;
}
