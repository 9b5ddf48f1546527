import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { googleConfig } from './config/google.config';
import { knowledgeConfig } from './config/knowledge.config';
import { ChatModule } from './logic/chat/chat.module';
import { KnowledgeModule } from './logic/knowledge/knowledge.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [knowledgeConfig, googleConfig] }),
    KnowledgeModule,
    ChatModule,
  ],
})
export class AppModule {}
