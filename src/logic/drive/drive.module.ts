import { Module } from '@nestjs/common';
import { DocumentStoreClient } from './document-store.client';
import { DriveService } from './drive.service';

@Module({
    providers: [DriveService, { provide: DocumentStoreClient, useExisting: DriveService }],
    exports: [DocumentStoreClient],
})
export class DriveModule {}
