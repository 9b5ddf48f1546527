import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { google, sheets_v4 } from 'googleapis';
import { googleConfig } from '../../config/google.config';
import { createGoogleAuth } from '../../utils/gcpAuth';
import { LogSinkError } from './chat-log.errors';
import { ChatLogEntry, ChatLogSink, toRow } from './chat-log.sink';

@Injectable()
export class SheetsChatLogService extends ChatLogSink {
    private readonly logger = new Logger(SheetsChatLogService.name);
    private sheets?: sheets_v4.Sheets;

    constructor(@Inject(googleConfig.KEY) private readonly settings: ConfigType<typeof googleConfig>) {
        super();
    }

    private client(): sheets_v4.Sheets {
        if (!this.sheets) {
            this.sheets = google.sheets({ version: 'v4', auth: createGoogleAuth(this.settings.credentialPaths) });
        }
        return this.sheets;
    }

    async append(entry: ChatLogEntry): Promise<void> {
        const spreadsheetId = this.settings.logSpreadsheetId;
        if (!spreadsheetId) {
            throw new LogSinkError('No log spreadsheet configured');
        }
        try {
            await this.client().spreadsheets.values.append({
                spreadsheetId,
                range: this.settings.logSheetRange,
                valueInputOption: 'RAW',
                insertDataOption: 'INSERT_ROWS',
                requestBody: { values: [toRow(entry)] },
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new LogSinkError(`Sheets append failed: ${message}`, { cause: error });
        }
        this.logger.debug(`Log saved for role ${entry.role}`);
    }
}
