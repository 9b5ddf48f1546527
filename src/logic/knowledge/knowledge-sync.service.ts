import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { knowledgeConfig } from '../../config/knowledge.config';
import { DocumentStoreClient } from '../drive/document-store.client';
import { GenerationClient } from '../gemini/generation.client';
import { IngestionService, PDF_MIME_TYPE } from './ingestion.service';
import { KnowledgeCacheService } from './knowledge-cache.service';
import { FolderNotFoundError, RoleEnumerationError, SyncAbortedError, describeError } from './knowledge.errors';
import {
  DisplayEntry,
  DocumentDescriptor,
  DocumentHandle,
  KnowledgeSnapshot,
  Result,
  RoleTag,
  SyncReport,
  SyncStatus,
  err,
  ok,
} from './types';

export const SYNC_MESSAGES: Record<SyncStatus, string> = {
  success: 'Data updated successfully.',
  failed: 'Update failed.',
  busy: 'A refresh is already in progress.',
};

/**
 * Rebuilds the role-scoped cache from the document store.
 *
 * One pass walks the configured roles in order, ingests every PDF in each
 * role's folder and publishes the result as a single snapshot. Only one pass
 * runs at a time; overlapping calls are answered with `busy`.
 */
@Injectable()
export class KnowledgeSyncService implements OnModuleInit {
  private readonly logger = new Logger(KnowledgeSyncService.name);
  private inFlight: Promise<SyncReport> | null = null;
  // Handles of the snapshot replaced by the latest publish. Readers may still
  // hold that snapshot, so they are only released one publish later.
  private retired: DocumentHandle[] = [];

  constructor(
    private readonly store: DocumentStoreClient,
    private readonly generation: GenerationClient,
    private readonly ingestion: IngestionService,
    private readonly cache: KnowledgeCacheService,
    @Inject(knowledgeConfig.KEY) private readonly settings: ConfigType<typeof knowledgeConfig>,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.settings.syncOnStartup) return;
    this.logger.log('Loading documents before accepting requests...');
    const report = await this.sync();
    this.logger.log(`Startup sync finished: ${report.status} (snapshot v${report.version})`);
  }

  isSyncing(): boolean {
    return this.inFlight !== null;
  }

  sync(): Promise<SyncReport> {
    if (this.inFlight) {
      this.logger.warn('Refresh rejected: another sync is still running');
      return Promise.resolve(this.reportCurrent('busy', null));
    }
    const run = this.run().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async run(): Promise<SyncReport> {
    const syncId = uuidv4();
    const startedAt = Date.now();
    this.logger.log(`Sync ${syncId} started (roles: ${this.settings.roleTags.join(', ') || 'none'})`);
    try {
      const { abandoned, ...draft } = await this.build(syncId);
      const previous = this.cache.snapshot();
      const snapshot = this.cache.publish({ syncId, ...draft });
      this.logger.log(`Sync ${syncId} published snapshot v${snapshot.version} in ${Date.now() - startedAt}ms`);
      const superseded = this.retired;
      this.retired = [...previous.documentsByRole.values()].flat();
      await this.release(syncId, [...abandoned, ...superseded]);
      return this.reportFor('success', syncId, snapshot);
    } catch (error) {
      const aborted = error instanceof SyncAbortedError ? error : new SyncAbortedError(describeError(error), { cause: error });
      this.logger.error(`Sync ${syncId} aborted, keeping snapshot v${this.cache.snapshot().version}: ${aborted.message}`);
      return this.reportCurrent('failed', syncId);
    }
  }

  private async build(syncId: string) {
    const { rootFolderId, roleTags } = this.settings;
    if (!rootFolderId) {
      throw new SyncAbortedError('No root folder configured (DRIVE_ROOT_FOLDER_ID)');
    }

    const documentsByRole = new Map<RoleTag, DocumentHandle[]>();
    const displayList: DisplayEntry[] = [];
    const unreachable: RoleEnumerationError[] = [];
    const abandoned: DocumentHandle[] = [];

    for (const role of roleTags) {
      const handles: DocumentHandle[] = [];
      documentsByRole.set(role, handles);

      const discovered = await this.discover(rootFolderId, role);
      if (!discovered.ok) {
        if (discovered.error instanceof RoleEnumerationError) {
          unreachable.push(discovered.error);
          this.logger.error(`[${syncId}] ${discovered.error.message}`);
        } else {
          this.logger.warn(`[${syncId}] ${discovered.error.message}; role "${role}" has no documents`);
        }
        continue;
      }

      for (const descriptor of discovered.value) {
        const result = await this.ingestion.ingest(descriptor);
        if (result.ok) handles.push(result.value);
        else if (result.error.abandoned) abandoned.push(result.error.abandoned);
        displayList.push({
          displayName: descriptor.displayName,
          viewUrl: descriptor.viewUrl,
          role,
          status: result.ok ? 'ready' : 'failed',
        });
      }
      this.logger.log(`[${syncId}] ${role}: ${handles.length}/${discovered.value.length} documents ready`);
    }

    if (roleTags.length > 0 && unreachable.length === roleTags.length) {
      throw new SyncAbortedError(`Document store unreachable for every role: ${unreachable[0].message}`, {
        cause: unreachable[0],
      });
    }
    return { documentsByRole, displayList, abandoned };
  }

  private async release(syncId: string, handles: DocumentHandle[]): Promise<void> {
    for (const handle of handles) {
      try {
        await this.generation.releaseDocument(handle);
      } catch (error) {
        this.logger.warn(`[${syncId}] Could not release ${handle.name} (${handle.displayName}): ${describeError(error)}`);
      }
    }
  }

  private async discover(
    rootFolderId: string,
    role: RoleTag,
  ): Promise<Result<DocumentDescriptor[], FolderNotFoundError | RoleEnumerationError>> {
    try {
      const folders = await this.store.listFolders(rootFolderId, role);
      const matches = folders.filter(f => f.name === role);
      if (matches.length === 0) return err(new FolderNotFoundError(role, rootFolderId));
      if (matches.length > 1) {
        this.logger.warn(`${matches.length} folders named "${role}"; using ${matches[0].id}`);
      }
      const files = await this.store.listFiles(matches[0].id, PDF_MIME_TYPE);
      return ok(files.map(f => ({ id: f.id, displayName: f.name, viewUrl: f.viewUrl || '#', role })));
    } catch (error) {
      return err(new RoleEnumerationError(role, { cause: error }));
    }
  }

  private reportCurrent(status: SyncStatus, syncId: string | null): SyncReport {
    return this.reportFor(status, syncId, this.cache.snapshot());
  }

  private reportFor(status: SyncStatus, syncId: string | null, snapshot: KnowledgeSnapshot): SyncReport {
    const documentCounts: Record<RoleTag, number> = {};
    for (const [role, handles] of snapshot.documentsByRole) {
      documentCounts[role] = handles.length;
    }
    return {
      status,
      syncId,
      version: snapshot.version,
      message: SYNC_MESSAGES[status],
      displayList: snapshot.displayList,
      documentCounts,
    };
  }
}
