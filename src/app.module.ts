/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, validation and
 * the portal feature modules.
 */

import { Module, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from './config/config.module';
import { AuthModule } from './auth';
import { MembersModule } from './members';
import { RequestsModule } from './requests';
import { HealthController } from './health/health.controller';
import { SheetErrorsFilter } from './shared/filters/sheet-errors.filter';

const environment = process.env.NODE_ENV ?? 'development';

@Module({
    imports: [
        // Logging
        LoggerModule.forRoot({
            pinoHttp: {
                level: environment === 'production' ? 'info' : environment === 'test' ? 'silent' : 'debug',
                transport: environment === 'development'
                    ? {
                        target: 'pino-pretty',
                        options: { colorize: true },
                    }
                    : undefined, // JSON output
                redact: ['req.headers.authorization', 'req.body.pin'],
            },
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: true },
        }),

        // Shared modules
        ConfigModule,

        // Feature modules
        AuthModule,
        MembersModule,
        RequestsModule,
    ],
    controllers: [HealthController],
    providers: [
        {
            provide: APP_PIPE,
            useValue: new ValidationPipe({ whitelist: true, transform: true }),
        },
        {
            provide: APP_FILTER,
            useClass: SheetErrorsFilter,
        },
    ],
})
export class AppModule { }
