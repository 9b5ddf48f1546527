import { Module } from '@nestjs/common';
import { ChatLogModule } from '../chat-log/chat-log.module';
import { GeminiModule } from '../gemini/gemini.module';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

@Module({
    imports: [KnowledgeModule, GeminiModule, ChatLogModule],
    controllers: [ChatController],
    providers: [ChatService],
})
export class ChatModule {}
