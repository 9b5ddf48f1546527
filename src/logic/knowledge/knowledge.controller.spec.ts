import { KnowledgeHarness, createKnowledgeHarness } from '../../testing/fakes';
import { KnowledgeController } from './knowledge.controller';

describe('KnowledgeController', () => {
  let h: KnowledgeHarness;
  let controller: KnowledgeController;

  beforeEach(async () => {
    h = await createKnowledgeHarness();
    h.store.addFolder('Student', [{ id: 's1', name: 'Rules.pdf', viewUrl: 'https://drive.example.test/s1/view' }]);
    controller = new KnowledgeController(h.sync, h.cache);
  });

  it('refreshes and returns the new display list', async () => {
    const result = await controller.refresh();

    expect(result).toEqual({
      status: 'success',
      message: 'Data updated successfully.',
      syncId: expect.any(String),
      version: 1,
      counts: { Student: 1, Prospective: 0, Guardian: 0 },
      files: [{ displayName: 'Rules.pdf', viewUrl: 'https://drive.example.test/s1/view', role: 'Student', status: 'ready' }],
    });
  });

  it('reports a failed refresh with the documents still being served', async () => {
    await controller.refresh();
    h.store.unreachable = true;

    const result = await controller.refresh();

    expect(result.status).toBe('failed');
    expect(result.message).toBe('Update failed.');
    expect(result.files).toHaveLength(1);
  });

  it('lists the published documents', async () => {
    expect(controller.documents()).toEqual({ version: 0, publishedAt: null, syncing: false, files: [] });

    await controller.refresh();

    const listed = controller.documents();
    expect(listed.version).toBe(1);
    expect(listed.publishedAt).toBeInstanceOf(Date);
    expect(listed.files.map(f => f.displayName)).toEqual(['Rules.pdf']);
  });
});
