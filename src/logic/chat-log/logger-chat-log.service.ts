import { Injectable, Logger } from '@nestjs/common';
import { ChatLogEntry, ChatLogSink, toRow } from './chat-log.sink';

/** Used when no spreadsheet is configured: the row goes to the application log. */
@Injectable()
export class LoggerChatLogService extends ChatLogSink {
    private readonly logger = new Logger('ChatLog');

    async append(entry: ChatLogEntry): Promise<void> {
        this.logger.log(JSON.stringify(toRow(entry)));
    }
}
