import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Readable } from 'node:stream';
import { drive_v3, google } from 'googleapis';
import { googleConfig } from '../../config/google.config';
import { createGoogleAuth } from '../../utils/gcpAuth';
import { DocumentStoreClient, StoreFile, StoreFolder } from './document-store.client';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

export function escapeQueryValue(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function buildFolderQuery(parentId: string, name: string): string {
    return `'${escapeQueryValue(parentId)}' in parents and name = '${escapeQueryValue(name)}' and mimeType = '${FOLDER_MIME_TYPE}' and trashed = false`;
}

export function buildFileQuery(folderId: string, mimeType: string): string {
    return `'${escapeQueryValue(folderId)}' in parents and mimeType = '${escapeQueryValue(mimeType)}' and trashed = false`;
}

@Injectable()
export class DriveService extends DocumentStoreClient {
    private readonly logger = new Logger(DriveService.name);
    private drive?: drive_v3.Drive;

    constructor(@Inject(googleConfig.KEY) private readonly settings: ConfigType<typeof googleConfig>) {
        super();
    }

    // Credentials are resolved on first use so a missing key fails the sync, not the boot.
    private client(): drive_v3.Drive {
        if (!this.drive) {
            const auth = createGoogleAuth(this.settings.credentialPaths);
            this.drive = google.drive({ version: 'v3', auth });
        }
        return this.drive;
    }

    async listFolders(parentId: string, name: string): Promise<StoreFolder[]> {
        const res = await this.client().files.list({
            q: buildFolderQuery(parentId, name),
            fields: 'files(id, name)',
            supportsAllDrives: true,
            includeItemsFromAllDrives: true,
        });
        const folders: StoreFolder[] = [];
        for (const f of res.data.files ?? []) {
            if (f.id && f.name) folders.push({ id: f.id, name: f.name });
        }
        return folders;
    }

    async listFiles(folderId: string, mimeType: string): Promise<StoreFile[]> {
        const files: StoreFile[] = [];
        let pageToken: string | undefined;
        do {
            const res = await this.client().files.list({
                q: buildFileQuery(folderId, mimeType),
                fields: 'nextPageToken, files(id, name, webViewLink)',
                pageSize: 100,
                pageToken,
                supportsAllDrives: true,
                includeItemsFromAllDrives: true,
            });
            for (const f of res.data.files ?? []) {
                if (!f.id || !f.name) continue;
                files.push({ id: f.id, name: f.name, viewUrl: f.webViewLink ?? undefined });
            }
            pageToken = res.data.nextPageToken ?? undefined;
        } while (pageToken);
        this.logger.debug(`Listed ${files.length} ${mimeType} files in ${folderId}`);
        return files;
    }

    async download(fileId: string): Promise<Readable> {
        const res = await this.client().files.get(
            { fileId, alt: 'media', supportsAllDrives: true },
            { responseType: 'stream' },
        );
        return res.data;
    }
}
