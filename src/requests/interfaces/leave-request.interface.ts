/**
 * @fileoverview Leave Request Interface
 *
 * Defines the rows of the Requests sheet, an append-only log written by the
 * portal and worked through by the administrator.
 */

export const REQUEST_TYPES = [
    'Leave balance query',
    'Contact change',
    'Billing question',
    'Other',
] as const;

export type RequestType = (typeof REQUEST_TYPES)[number];

/** Status of every newly submitted request; later states are set in the sheet */
export const INITIAL_REQUEST_STATUS = 'New';

/**
 * Request record as stored in the Requests sheet.
 *
 * @remarks
 * The portal only ever appends. Status, handledBy and adminNotes are
 * edited by the administrator directly in the sheet.
 */
export interface LeaveRequestRecord {
    /** Submission time, `yyyy-MM-dd HH:mm:ss` in the portal time zone */
    timestamp: string;
    memberEmail: string;
    memberId: string;
    requestType: string;
    message: string;
    status: string;
    handledBy: string;
    adminNotes: string;
}

/** Sheet column holding each record field */
export const REQUEST_COLUMNS: Record<keyof LeaveRequestRecord, string> = {
    timestamp: 'Timestamp',
    memberEmail: 'MemberEmail',
    memberId: 'MemberID',
    requestType: 'RequestType',
    message: 'Message',
    status: 'Status',
    handledBy: 'HandledBy',
    adminNotes: 'AdminNotes',
};

/** HandledBy and AdminNotes start empty, so a sheet without them still works */
export const REQUIRED_REQUEST_COLUMNS = [
    REQUEST_COLUMNS.timestamp,
    REQUEST_COLUMNS.memberEmail,
    REQUEST_COLUMNS.memberId,
    REQUEST_COLUMNS.requestType,
    REQUEST_COLUMNS.message,
    REQUEST_COLUMNS.status,
];
