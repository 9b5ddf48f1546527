export type RoleTag = string;

export type HandleState = 'PENDING' | 'READY' | 'FAILED';

export interface DocumentDescriptor {
  id: string;
  displayName: string;
  viewUrl: string;
  role: RoleTag;
}

/** Reference to a document accepted by the generation service. */
export interface DocumentHandle {
  name: string;
  uri: string;
  mimeType: string;
  displayName: string;
  state: HandleState;
}

export type DisplayStatus = 'ready' | 'failed';

export interface DisplayEntry {
  displayName: string;
  viewUrl: string;
  role: RoleTag;
  status: DisplayStatus;
}

export interface KnowledgeSnapshot {
  version: number;
  syncId: string | null;
  publishedAt: Date | null;
  documentsByRole: ReadonlyMap<RoleTag, readonly DocumentHandle[]>;
  displayList: readonly DisplayEntry[];
}

export type SyncStatus = 'success' | 'failed' | 'busy';

export interface SyncReport {
  status: SyncStatus;
  syncId: string | null;
  version: number;
  message: string;
  displayList: readonly DisplayEntry[];
  documentCounts: Record<RoleTag, number>;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
