/**
 * @fileoverview Sheet Errors Filter
 *
 * Maps data-shape and upstream store failures to HTTP responses.
 *
 * @remarks
 * - TableShapeError → 500, the message names the missing columns
 * - SpreadsheetStoreError → 502, the message carries the upstream reason and a hint
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { TableShapeError } from '../tables';
import { SpreadsheetStoreError } from '../sheets/spreadsheet-store.error';

@Catch(TableShapeError, SpreadsheetStoreError)
export class SheetErrorsFilter implements ExceptionFilter {
    private readonly logger = new Logger(SheetErrorsFilter.name);

    catch(exception: TableShapeError | SpreadsheetStoreError, host: ArgumentsHost): void {
        const response = host.switchToHttp().getResponse<Response>();
        const status = exception instanceof TableShapeError
            ? HttpStatus.INTERNAL_SERVER_ERROR
            : HttpStatus.BAD_GATEWAY;

        this.logger.error({ msg: 'Spreadsheet request failed', error: exception.name, detail: exception.message });

        response.status(status).json({
            statusCode: status,
            error: exception.name,
            message: exception.message,
        });
    }
}
