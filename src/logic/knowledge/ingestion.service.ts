import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { createWriteStream } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { knowledgeConfig } from '../../config/knowledge.config';
import { DocumentStoreClient } from '../drive/document-store.client';
import { GenerationClient } from '../gemini/generation.client';
import {
  DownloadError,
  IngestError,
  IngestPollError,
  IngestRejectedError,
  IngestSubmitError,
  IngestTimeoutError,
  describeError,
} from './knowledge.errors';
import { PollClock } from './poll-clock';
import { DocumentDescriptor, DocumentHandle, Result, err, ok } from './types';

export const PDF_MIME_TYPE = 'application/pdf';

/**
 * Download + submit + await-ready for a single document.
 *
 * Every failure is returned as an IngestError instead of thrown, so a sync
 * pass can keep going with the remaining documents.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly store: DocumentStoreClient,
    private readonly generation: GenerationClient,
    private readonly clock: PollClock,
    @Inject(knowledgeConfig.KEY) private readonly settings: ConfigType<typeof knowledgeConfig>,
  ) {}

  async ingest(descriptor: DocumentDescriptor): Promise<Result<DocumentHandle, IngestError>> {
    let stagingDir: string;
    try {
      stagingDir = await mkdtemp(path.join(this.settings.stagingDir, 'ingest-'));
    } catch (error) {
      return this.report(err(new DownloadError(descriptor, `Cannot create staging area: ${describeError(error)}`, { cause: error })), descriptor);
    }
    try {
      return this.report(await this.stageAndSubmit(descriptor, path.join(stagingDir, 'document.pdf')), descriptor);
    } finally {
      await this.discardStaging(stagingDir);
    }
  }

  private async discardStaging(stagingDir: string): Promise<void> {
    try {
      await rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Could not remove staging area ${stagingDir}: ${describeError(error)}`);
    }
  }

  private report(result: Result<DocumentHandle, IngestError>, descriptor: DocumentDescriptor) {
    if (result.ok) {
      this.logger.log(`Ready: ${descriptor.displayName} (${descriptor.role})`);
    } else {
      this.logger.warn(`Skipped ${descriptor.displayName} (${descriptor.role}) [${result.error.reason}]: ${result.error.message}`);
    }
    return result;
  }

  private async stageAndSubmit(descriptor: DocumentDescriptor, stagedPath: string): Promise<Result<DocumentHandle, IngestError>> {
    try {
      const source = await this.store.download(descriptor.id);
      await pipeline(source, createWriteStream(stagedPath));
    } catch (error) {
      return err(new DownloadError(descriptor, `Download failed: ${describeError(error)}`, { cause: error }));
    }

    let handle: DocumentHandle;
    try {
      handle = await this.generation.submitDocument({
        path: stagedPath,
        displayName: descriptor.displayName,
        mimeType: PDF_MIME_TYPE,
      });
    } catch (error) {
      return err(new IngestSubmitError(descriptor, `Upload failed: ${describeError(error)}`, { cause: error }));
    }

    return this.awaitReady(descriptor, handle);
  }

  private async awaitReady(descriptor: DocumentDescriptor, handle: DocumentHandle): Promise<Result<DocumentHandle, IngestError>> {
    let state = handle.state;
    let attempts = 0;
    while (state === 'PENDING' && attempts < this.settings.pollMaxAttempts) {
      await this.clock.sleep(this.settings.pollIntervalMs);
      attempts++;
      try {
        state = await this.generation.getHandleState(handle);
      } catch (error) {
        return err(new IngestPollError(descriptor, `Polling failed: ${describeError(error)}`, { cause: error, abandoned: handle }));
      }
    }

    switch (state) {
      case 'READY':
        return ok({ ...handle, state });
      case 'FAILED':
        return err(new IngestRejectedError(descriptor, `Processing failed for ${descriptor.displayName}`, { abandoned: handle }));
      case 'PENDING':
        return err(new IngestTimeoutError(descriptor, attempts, handle));
    }
  }
}
