/**
 * @fileoverview Members Controller
 *
 * HTTP endpoint for a member's own leave figures.
 *
 * @remarks
 * Endpoints:
 * - GET /members/me - Leave summary of the logged-in member (requires JWT)
 */

import { Controller, Get, UseGuards, Request } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiTags, ApiOperation, ApiBearerAuth, ApiOkResponse } from '@nestjs/swagger';
import { AuthenticatedMember } from '../auth/interfaces';
import { MembersService } from './members.service';
import { LeaveSummaryDto } from './dto';

@ApiTags('members')
@ApiBearerAuth()
@Controller('members')
@UseGuards(AuthGuard('jwt'))
export class MembersController {
    constructor(private membersService: MembersService) { }

    @Get('me')
    @ApiOperation({ summary: 'My leave balance', description: 'Leave year, allowance, taken and balance as recorded by the office' })
    @ApiOkResponse({ type: LeaveSummaryDto })
    async me(@Request() req: { user: AuthenticatedMember }): Promise<LeaveSummaryDto> {
        return this.membersService.getLeaveSummary(req.user);
    }
}
