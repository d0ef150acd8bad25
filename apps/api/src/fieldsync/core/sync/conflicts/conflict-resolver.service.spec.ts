import { createQuietLogService } from '../../../../../test/support/sync-test-harness';
import { FN_SYNC_RESOLVE_CONFLICT } from '../../functional-ids';
import { LogCategory } from '../../logging/log.service';
import { ConflictResolverService } from './conflict-resolver.service';

describe('ConflictResolverService', () => {
  const logService = createQuietLogService();
  const resolver = new ConflictResolverService(logService);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const server = {
    description: 'Server version',
    severity: 'high',
    updated_at: '2026-01-29T13:00:00.000Z',
  };

  describe('LWW', () => {
    it('keeps the server state when it is newer', () => {
      const client = {
        description: 'Client version',
        updated_at: '2026-01-29T12:00:00.000Z',
      };

      expect(resolver.resolve(server, client, 'LWW')).toEqual({
        resolved: true,
        winner: 'server',
        state: server,
      });
    });

    it('takes the client state when it is strictly newer', () => {
      const client = {
        description: 'Client version',
        updated_at: '2026-01-29T14:00:00.000Z',
      };

      expect(resolver.resolve(server, client)).toEqual({
        resolved: true,
        winner: 'client',
        state: client,
      });
    });

    it('favours the server on ties', () => {
      const client = { description: 'Client version', updated_at: server.updated_at };

      expect(resolver.resolve(server, client, 'LWW')).toMatchObject({ winner: 'server' });
    });

    it('favours the server when a timestamp is missing or unparseable', () => {
      expect(resolver.resolve(server, { description: 'x' }, 'LWW')).toMatchObject({
        winner: 'server',
      });
      expect(
        resolver.resolve(server, { description: 'x', updated_at: 'yesterday' }, 'LWW'),
      ).toMatchObject({ winner: 'server' });
    });

    it('compares instants rather than strings', () => {
      const client = {
        description: 'Client version',
        updated_at: '2026-01-29T15:00:00+01:00',
      };

      expect(resolver.resolve(server, client, 'LWW')).toMatchObject({ winner: 'client' });
    });
  });

  it('returns the raw conflict for manual resolution', () => {
    const client = { description: 'Client version' };

    expect(resolver.resolve(server, client, 'manual')).toEqual({
      resolved: false,
      conflict: {
        server_state: server,
        client_changes: client,
        requires_manual_resolution: true,
      },
    });
  });

  describe('field merge', () => {
    const olderClient = {
      description: 'Client description',
      severity: 'low',
      title: 'Client title',
      updated_at: '2026-01-29T12:00:00.000Z',
    };

    it('applies client_wins and server_wins per field', () => {
      const merged = resolver.mergeFields(server, olderClient, {
        description: 'client_wins',
        severity: 'server_wins',
        title: 'client_wins',
        updated_at: 'server_wins',
      });

      expect(merged).toEqual({
        description: 'Client description',
        severity: 'high',
        title: 'Client title',
        updated_at: '2026-01-29T13:00:00.000Z',
      });
    });

    it('uses whole-state timestamps for unlisted fields', () => {
      expect(resolver.mergeFields(server, olderClient)).toEqual(server);

      const newerClient = { ...olderClient, updated_at: '2026-01-29T14:00:00.000Z' };
      expect(resolver.mergeFields(server, newerClient)).toEqual(newerClient);
    });

    it('reports a merged winner through resolve()', () => {
      expect(
        resolver.resolve(server, olderClient, 'field_merge', { title: 'client_wins' }),
      ).toEqual({
        resolved: true,
        winner: 'merged',
        state: { ...server, title: 'Client title' },
      });
    });

    it('tags the merge log event with the conflict resolution function id', () => {
      const logEvent = jest.spyOn(logService, 'logEvent');

      resolver.mergeFields(server, olderClient, { title: 'client_wins' });

      expect(logEvent).toHaveBeenCalledTimes(1);
      expect(logEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          category: LogCategory.SYNC,
          functionId: FN_SYNC_RESOLVE_CONFLICT,
          message: 'Merged 4 client field(s) into server state',
        }),
      );
    });
  });
});
