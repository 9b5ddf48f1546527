import { Module } from '@nestjs/common';
import { DriveModule } from '../drive/drive.module';
import { GeminiModule } from '../gemini/gemini.module';
import { IngestionService } from './ingestion.service';
import { KnowledgeCacheService } from './knowledge-cache.service';
import { KnowledgeController } from './knowledge.controller';
import { KnowledgeSyncService } from './knowledge-sync.service';
import { PollClock } from './poll-clock';

@Module({
  imports: [DriveModule, GeminiModule],
  controllers: [KnowledgeController],
  providers: [PollClock, IngestionService, KnowledgeCacheService, KnowledgeSyncService],
  exports: [KnowledgeCacheService, KnowledgeSyncService],
})
export class KnowledgeModule {}
