import { Module } from '@nestjs/common';
import { GoogleSheetsStore } from './google-sheets.store';
import { SPREADSHEET_STORE } from './spreadsheet-store.interface';

@Module({
    providers: [{ provide: SPREADSHEET_STORE, useClass: GoogleSheetsStore }],
    exports: [SPREADSHEET_STORE],
})
export class SheetsModule { }
