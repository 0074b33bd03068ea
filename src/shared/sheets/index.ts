/**
 * @fileoverview Shared Sheets Barrel Export
 */

export * from './sheets.module';
export * from './spreadsheet-store.interface';
export * from './spreadsheet-store.error';
export * from './google-sheets.store';
