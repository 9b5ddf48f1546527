import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { KnowledgeCacheService } from './knowledge-cache.service';
import { KnowledgeSyncService } from './knowledge-sync.service';

@Controller('knowledge')
export class KnowledgeController {
  constructor(
    private readonly syncService: KnowledgeSyncService,
    private readonly cache: KnowledgeCacheService,
  ) {}

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh() {
    const report = await this.syncService.sync();
    return {
      status: report.status,
      message: report.message,
      syncId: report.syncId,
      version: report.version,
      counts: report.documentCounts,
      files: report.displayList,
    };
  }

  @Get('documents')
  documents() {
    const snapshot = this.cache.snapshot();
    return {
      version: snapshot.version,
      publishedAt: snapshot.publishedAt,
      syncing: this.syncService.isSyncing(),
      files: snapshot.displayList,
    };
  }
}
