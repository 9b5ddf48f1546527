import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { googleConfig } from '../../config/google.config';
import { ChatLogSink } from './chat-log.sink';
import { LoggerChatLogService } from './logger-chat-log.service';
import { SheetsChatLogService } from './sheets-chat-log.service';

@Module({
    providers: [
        SheetsChatLogService,
        LoggerChatLogService,
        {
            provide: ChatLogSink,
            inject: [googleConfig.KEY, SheetsChatLogService, LoggerChatLogService],
            useFactory: (
                settings: ConfigType<typeof googleConfig>,
                sheets: SheetsChatLogService,
                fallback: LoggerChatLogService,
            ): ChatLogSink => (settings.logSpreadsheetId ? sheets : fallback),
        },
    ],
    exports: [ChatLogSink],
})
export class ChatLogModule {}
