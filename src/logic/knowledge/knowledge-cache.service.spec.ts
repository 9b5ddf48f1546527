import { Test, TestingModule } from '@nestjs/testing';
import { KnowledgeCacheService } from './knowledge-cache.service';
import { DocumentHandle } from './types';

const handle = (name: string): DocumentHandle => ({
  name: `files/${name}`,
  uri: `https://files.example.test/${name}`,
  mimeType: 'application/pdf',
  displayName: `${name}.pdf`,
  state: 'READY',
});

describe('KnowledgeCacheService', () => {
  let cache: KnowledgeCacheService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [KnowledgeCacheService],
    }).compile();

    cache = module.get<KnowledgeCacheService>(KnowledgeCacheService);
  });

  it('starts with an empty version 0 snapshot', () => {
    const snapshot = cache.snapshot();
    expect(snapshot.version).toBe(0);
    expect(snapshot.publishedAt).toBeNull();
    expect(snapshot.documentsByRole.size).toBe(0);
    expect(cache.displayList()).toEqual([]);
  });

  it('resolves unknown roles to an empty list', () => {
    cache.publish({ syncId: 'sync-1', documentsByRole: new Map([['Student', [handle('rules')]]]), displayList: [] });

    expect(cache.documentsFor('Alumni')).toEqual([]);
    expect(cache.documentsFor('')).toEqual([]);
    expect(cache.documentsFor('Student').map(h => h.name)).toEqual(['files/rules']);
  });

  it('swaps the whole snapshot and leaves earlier references untouched', () => {
    cache.publish({
      syncId: 'sync-1',
      documentsByRole: new Map([['Student', [handle('rules')]]]),
      displayList: [{ displayName: 'rules.pdf', viewUrl: '#', role: 'Student', status: 'ready' }],
    });
    const before = cache.snapshot();

    cache.publish({
      syncId: 'sync-2',
      documentsByRole: new Map([['Student', [handle('calendar'), handle('menu')]]]),
      displayList: [],
    });

    expect(before.version).toBe(1);
    expect(cache.documentsFor('Student', before).map(h => h.name)).toEqual(['files/rules']);
    expect(before.displayList).toHaveLength(1);
    expect(cache.snapshot().version).toBe(2);
    expect(cache.snapshot().syncId).toBe('sync-2');
    expect(cache.documentsFor('Student').map(h => h.name)).toEqual(['files/calendar', 'files/menu']);
  });

  it('is not affected by later changes to the draft', () => {
    const handles = [handle('rules')];
    const displayList = [{ displayName: 'rules.pdf', viewUrl: '#', role: 'Student', status: 'ready' as const }];
    const draftRoles = new Map([['Student', handles]]);
    const published = cache.publish({ syncId: 'sync-1', documentsByRole: draftRoles, displayList });

    handles.push(handle('late'));
    displayList.pop();
    draftRoles.set('Guardian', [handle('other')]);

    expect(cache.documentsFor('Student', published)).toHaveLength(1);
    expect(published.displayList).toHaveLength(1);
    expect(published.documentsByRole.has('Guardian')).toBe(false);
    expect(Object.isFrozen(published)).toBe(true);
    expect(Object.isFrozen(cache.documentsFor('Student'))).toBe(true);
  });
});
