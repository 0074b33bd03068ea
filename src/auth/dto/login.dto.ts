/**
 * @fileoverview Login DTOs
 */

import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { LeaveSummaryDto } from '../../members/dto';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class LoginDto {
    @ApiProperty({ example: 'you@example.com', description: 'Email recorded with the office' })
    @Transform(trim)
    @IsString()
    @IsNotEmpty()
    @MaxLength(254)
    email!: string;

    @ApiProperty({ example: '4821', description: 'PIN issued by the office' })
    @Transform(trim)
    @IsString()
    @IsNotEmpty()
    @MaxLength(64)
    pin!: string;
}

export class LoginResponseDto {
    /** Bearer token for the remaining portal endpoints */
    @ApiProperty()
    accessToken!: string;

    /** Token lifetime in seconds */
    @ApiProperty({ example: 1800 })
    expiresIn!: number;

    @ApiProperty({ type: LeaveSummaryDto })
    member!: LeaveSummaryDto;
}
