import { Injectable } from '@nestjs/common';
import { DisplayEntry, DocumentHandle, KnowledgeSnapshot, RoleTag } from './types';

const EMPTY_HANDLES: readonly DocumentHandle[] = Object.freeze([]);

export interface SnapshotDraft {
  syncId: string;
  documentsByRole: Map<RoleTag, DocumentHandle[]>;
  displayList: DisplayEntry[];
}

/**
 * Holds the published snapshot. A snapshot is frozen before it is published
 * and replaced by a single assignment, so readers holding a reference keep a
 * consistent view for as long as they need it.
 */
@Injectable()
export class KnowledgeCacheService {
  private current: KnowledgeSnapshot = freezeSnapshot({
    version: 0,
    syncId: null,
    publishedAt: null,
    documentsByRole: new Map(),
    displayList: [],
  });

  snapshot(): KnowledgeSnapshot {
    return this.current;
  }

  documentsFor(role: RoleTag, snapshot: KnowledgeSnapshot = this.current): readonly DocumentHandle[] {
    return snapshot.documentsByRole.get(role) ?? EMPTY_HANDLES;
  }

  displayList(): readonly DisplayEntry[] {
    return this.current.displayList;
  }

  publish(draft: SnapshotDraft): KnowledgeSnapshot {
    const next = freezeSnapshot({
      version: this.current.version + 1,
      syncId: draft.syncId,
      publishedAt: new Date(),
      documentsByRole: draft.documentsByRole,
      displayList: draft.displayList,
    });
    this.current = next;
    return next;
  }
}

function freezeSnapshot(snapshot: KnowledgeSnapshot): KnowledgeSnapshot {
  // Copy so later mutation of the draft cannot reach a published snapshot.
  const roles = new Map<RoleTag, readonly DocumentHandle[]>();
  for (const [role, handles] of snapshot.documentsByRole) {
    roles.set(role, Object.freeze(handles.map(h => Object.freeze({ ...h }))));
  }
  return Object.freeze({
    ...snapshot,
    documentsByRole: roles,
    displayList: Object.freeze(snapshot.displayList.map(e => Object.freeze({ ...e }))),
  });
}
