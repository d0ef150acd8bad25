import {
  createSyncHarness,
  SyncHarness,
} from '../../../../../test/support/sync-test-harness';

describe('PullProcessorService', () => {
  let harness: SyncHarness;

  beforeEach(async () => {
    harness = await createSyncHarness({ defaultPullLimit: 2, maxPullLimit: 3 });
  });

  afterEach(async () => {
    await harness.dataSource.destroy();
  });

  const appendChanges = async (count: number) => {
    for (let serverId = 1; serverId <= count; serverId++) {
      await harness.changeLedger.append(harness.dataSource.manager, {
        entityType: 'property',
        serverId,
        action: 'create',
        revision: 1,
        payload: { id: serverId },
        userId: 'user-1',
      });
    }
  };

  it('starts from the beginning of an empty ledger', async () => {
    await expect(harness.pull.processPull('user-1')).resolves.toEqual({
      changes: [],
      next_cursor: 'chg_000000000000',
      has_more: false,
    });
  });

  it('pages through the ledger in change order', async () => {
    await appendChanges(3);

    const first = await harness.pull.processPull('user-1');
    expect(first.changes.map((change) => change.change_id)).toEqual([
      'chg_000000000001',
      'chg_000000000002',
    ]);
    expect(first.next_cursor).toBe('chg_000000000002');
    expect(first.has_more).toBe(true);

    const second = await harness.pull.processPull('user-1', first.next_cursor);
    expect(second.changes.map((change) => change.server_id)).toEqual([3]);
    expect(second.next_cursor).toBe('chg_000000000003');
    expect(second.has_more).toBe(false);
  });

  it('reports no further pages when the page is exactly full', async () => {
    await appendChanges(2);

    const page = await harness.pull.processPull('user-1');

    expect(page.changes).toHaveLength(2);
    expect(page.has_more).toBe(false);
  });

  it('keeps the caller cursor when nothing is new', async () => {
    await appendChanges(1);

    await expect(
      harness.pull.processPull('user-1', 'chg_000000000001'),
    ).resolves.toEqual({
      changes: [],
      next_cursor: 'chg_000000000001',
      has_more: false,
    });
  });

  it('shapes each change from its ledger entry', async () => {
    await harness.changeLedger.append(harness.dataSource.manager, {
      entityType: 'defect',
      serverId: 9,
      action: 'delete',
      revision: 3,
      payload: null,
      userId: 'user-2',
    });

    const [change] = (await harness.pull.processPull('user-1')).changes;
    const [entry] = await harness.changeLedger.readAfter(0, 1);

    expect(change).toEqual({
      change_id: 'chg_000000000001',
      entity_type: 'defect',
      server_id: 9,
      action: 'delete',
      revision: 3,
      updated_at: entry.created_at.toISOString(),
      payload: null,
    });
  });

  it('accepts bare numeric cursors and treats garbage as the beginning', async () => {
    await appendChanges(3);

    const fromBare = await harness.pull.processPull('user-1', '2');
    expect(fromBare.changes.map((change) => change.server_id)).toEqual([3]);

    const fromGarbage = await harness.pull.processPull('user-1', 'not-a-cursor');
    expect(fromGarbage.changes.map((change) => change.server_id)).toEqual([1, 2]);
  });

  describe('clampLimit', () => {
    it('uses the default limit when none is given', () => {
      expect(harness.pull.clampLimit()).toBe(2);
      expect(harness.pull.clampLimit(null)).toBe(2);
      expect(harness.pull.clampLimit(Number.NaN)).toBe(2);
    });

    it('keeps the limit between 1 and the maximum', () => {
      expect(harness.pull.clampLimit(0)).toBe(1);
      expect(harness.pull.clampLimit(-5)).toBe(1);
      expect(harness.pull.clampLimit(2.9)).toBe(2);
      expect(harness.pull.clampLimit(50)).toBe(3);
    });
  });
});
