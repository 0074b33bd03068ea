/**
 * @fileoverview Leave Summary DTO
 *
 * What a member sees about themselves. Notes and credentials are never included.
 */

import { ApiProperty } from '@nestjs/swagger';
import { Member } from '../interfaces';

export class LeaveSummaryDto {
    @ApiProperty({ example: 'M001' })
    memberId!: string;

    @ApiProperty({ example: 'Sam Rivera' })
    memberName!: string;

    @ApiProperty({ example: 'sam@example.com' })
    email!: string;

    @ApiProperty({ example: '2026' })
    leaveYear!: string;

    @ApiProperty({ type: Number, nullable: true, example: 4 })
    annualAllowance!: number | null;

    @ApiProperty({ type: Number, nullable: true, example: 1 })
    leaveTaken!: number | null;

    @ApiProperty({ type: Number, nullable: true, example: 3 })
    leaveBalance!: number | null;

    @ApiProperty({ example: '2026-09-30' })
    lastUpdated!: string;
}

export function toLeaveSummary(member: Member): LeaveSummaryDto {
    return {
        memberId: member.memberId,
        memberName: member.memberName,
        email: member.email,
        leaveYear: member.leaveYear,
        annualAllowance: member.annualAllowance,
        leaveTaken: member.leaveTaken,
        leaveBalance: member.leaveBalance,
        lastUpdated: member.lastUpdated,
    };
}
