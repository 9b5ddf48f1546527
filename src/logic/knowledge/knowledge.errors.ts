import { DocumentDescriptor, DocumentHandle, RoleTag } from './types';

export interface IngestErrorOptions {
  cause?: unknown;
  /** uploaded handle that never became usable and should be released remotely */
  abandoned?: DocumentHandle;
}

export abstract class IngestError extends Error {
  abstract readonly reason: 'download' | 'submit' | 'poll' | 'timeout' | 'rejected';
  readonly abandoned?: DocumentHandle;

  constructor(readonly descriptor: DocumentDescriptor, message: string, options: IngestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.abandoned = options.abandoned;
  }
}

export class DownloadError extends IngestError {
  readonly reason = 'download';
}

export class IngestSubmitError extends IngestError {
  readonly reason = 'submit';
}

export class IngestPollError extends IngestError {
  readonly reason = 'poll';
}

/** The poll ceiling was reached while the handle was still pending. */
export class IngestTimeoutError extends IngestError {
  readonly reason = 'timeout';

  constructor(descriptor: DocumentDescriptor, readonly attempts: number, abandoned?: DocumentHandle) {
    super(descriptor, `${descriptor.displayName} still pending after ${attempts} polls`, { abandoned });
  }
}

export class IngestRejectedError extends IngestError {
  readonly reason = 'rejected';
}

export class FolderNotFoundError extends Error {
  constructor(readonly role: RoleTag, readonly parentId: string) {
    super(`No folder named "${role}" under ${parentId}`);
    this.name = 'FolderNotFoundError';
  }
}

export class RoleEnumerationError extends Error {
  constructor(readonly role: RoleTag, options?: { cause?: unknown }) {
    super(`Could not enumerate documents for role "${role}": ${describeError(options?.cause)}`, options);
    this.name = 'RoleEnumerationError';
  }
}

export class SyncAbortedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncAbortedError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
