import { Module } from '@nestjs/common';
import { SheetsModule } from '../shared/sheets';
import { MembersRepository } from './members.repository';
import { MembersService } from './members.service';
import { MembersController } from './members.controller';

@Module({
    imports: [SheetsModule],
    controllers: [MembersController],
    providers: [MembersRepository, MembersService],
    exports: [MembersRepository],
})
export class MembersModule { }
