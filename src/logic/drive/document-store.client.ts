import { Readable } from 'node:stream';

export interface StoreFolder {
    id: string;
    name: string;
}

export interface StoreFile {
    id: string;
    name: string;
    viewUrl?: string;
}

/**
 * Read-only access to the folder tree that holds the source documents.
 * Bound to the Drive implementation in DriveModule; tests provide fakes.
 */
export abstract class DocumentStoreClient {
    abstract listFolders(parentId: string, name: string): Promise<StoreFolder[]>;
    abstract listFiles(folderId: string, mimeType: string): Promise<StoreFile[]>;
    abstract download(fileId: string): Promise<Readable>;
}
