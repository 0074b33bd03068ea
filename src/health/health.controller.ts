import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';

@ApiTags('health')
@Controller('health')
export class HealthController {
    /**
     * Liveness probe. Does not touch the spreadsheet store.
     */
    @Get()
    @ApiOperation({ summary: 'Health check' })
    health(): { status: string } {
        return { status: 'ok' };
    }
}
