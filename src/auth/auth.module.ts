import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { SheetsModule } from '../shared/sheets';
import { MembersModule } from '../members';
import { JwtStrategy } from './jwt.strategy';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';

@Module({
    imports: [PassportModule.register({ defaultStrategy: 'jwt' }), SheetsModule, MembersModule],
    controllers: [AuthController],
    providers: [JwtStrategy, AuthService],
    exports: [PassportModule],
})
export class AuthModule { }
