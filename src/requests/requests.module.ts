/**
 * @fileoverview Requests Module
 *
 * Member update requests: submission to and listing from the Requests sheet.
 */

import { Module } from '@nestjs/common';
import { SheetsModule } from '../shared/sheets';
import { MembersModule } from '../members';
import { RequestsRepository } from './requests.repository';
import { RequestsService } from './requests.service';
import { RequestsController } from './requests.controller';

@Module({
    imports: [SheetsModule, MembersModule],
    controllers: [RequestsController],
    providers: [RequestsRepository, RequestsService],
})
export class RequestsModule { }
