/**
 * @fileoverview Requests Controller
 *
 * HTTP endpoints for member update requests.
 *
 * @remarks
 * Endpoints:
 * - POST /requests - Submit a request (requires JWT)
 * - GET /requests - The caller's own requests and their status (requires JWT)
 */

import { Body, Controller, Get, Post, Request, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiTags, ApiOperation, ApiBearerAuth } from '@nestjs/swagger';
import { AuthenticatedMember } from '../auth/interfaces';
import { RequestsService } from './requests.service';
import { CreateRequestDto } from './dto';
import { LeaveRequestRecord } from './interfaces';

@ApiTags('requests')
@ApiBearerAuth()
@Controller('requests')
@UseGuards(AuthGuard('jwt'))
export class RequestsController {
    constructor(private requestsService: RequestsService) { }

    @Post()
    @ApiOperation({ summary: 'Request an update', description: 'Send a query or change request to the office' })
    async create(
        @Body() request: CreateRequestDto,
        @Request() req: { user: AuthenticatedMember },
    ): Promise<LeaveRequestRecord> {
        return this.requestsService.submit(req.user, request);
    }

    @Get()
    @ApiOperation({ summary: 'My requests', description: 'Requests submitted by the logged-in member' })
    async list(@Request() req: { user: AuthenticatedMember }): Promise<LeaveRequestRecord[]> {
        return this.requestsService.listForMember(req.user);
    }
}
