/**
 * @fileoverview Create Request DTO
 */

import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsIn, IsString, MaxLength } from 'class-validator';
import { REQUEST_TYPES, RequestType } from '../interfaces';

export const MAX_MESSAGE_LENGTH = 2000;

export class CreateRequestDto {
    @ApiProperty({ enum: REQUEST_TYPES, example: 'Leave balance query' })
    @IsIn(REQUEST_TYPES)
    requestType!: RequestType;

    @ApiProperty({ maxLength: MAX_MESSAGE_LENGTH, example: 'I think my March leave is missing.' })
    @Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value))
    @IsString()
    @MaxLength(MAX_MESSAGE_LENGTH)
    message!: string;
}
