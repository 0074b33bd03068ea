// OpenTelemetry must be imported FIRST before any other imports
import './tracing';

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap() {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    const logger = app.get(Logger);
    app.useLogger(logger);
    app.enableShutdownHooks();

    // Swagger API documentation
    const config = new DocumentBuilder()
        .setTitle('Member Leave Portal API')
        .setDescription('Member self-service for leave balances and update requests')
        .setVersion('1.0')
        .addBearerAuth()
        .addTag('auth', 'Email and PIN login')
        .addTag('members', 'Leave balances')
        .addTag('requests', 'Update requests to the office')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api-docs', app, document);

    const port = process.env.PORT ?? 3000;
    await app.listen(port);

    logger.log(`Member Leave Portal API running on http://localhost:${port}`);
    logger.log(`Swagger docs available at http://localhost:${port}/api-docs`);
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start the portal', error);
    process.exit(1);
});
