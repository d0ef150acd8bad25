import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { FN_LOG_SECURITY_EVENT, FN_LOG_SYSTEM_EVENT, FN_SYNC_PUSH } from '../functional-ids';
import { LogCategory, LogLevel, LogService } from './log.service';

describe('LogService', () => {
  const timestamp = new Date('2026-03-01T10:00:00.000Z');

  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const createService = (env: Record<string, string>) =>
    new LogService(new ConfigService(env));

  it('drops events below the configured threshold', () => {
    const service = createService({ LOG_LEVEL: 'WARN' });

    expect(
      service.logEvent({ category: LogCategory.SYNC, level: LogLevel.INFO, message: 'quiet' }),
    ).toBeNull();
    expect(
      service.logEvent({ category: LogCategory.SYNC, level: 'warn', message: 'loud' }),
    ).toMatchObject({ level: LogLevel.WARNING, message: 'loud' });
  });

  it('attaches the function id and actor to the metadata', () => {
    const service = createService({});

    const event = service.logEvent({
      category: 'sync',
      message: 'Push applied',
      identifier: 'idempotency_key:k-1',
      functionId: FN_SYNC_PUSH,
      actorUserId: 'user-1',
      metadata: { deviceId: 'device-1' },
      timestamp,
    });

    expect(event).toEqual({
      timestamp: '2026-03-01T10:00:00.000Z',
      level: LogLevel.INFO,
      category: LogCategory.SYNC,
      message: 'Push applied',
      identifier: 'idempotency_key:k-1',
      functionId: FN_SYNC_PUSH,
      metadata: {
        deviceId: 'device-1',
        functionId: FN_SYNC_PUSH,
        actorUserId: 'user-1',
      },
    });
  });

  it('files unknown categories under SYSTEM', () => {
    const service = createService({});

    const event = service.logEvent({ category: 'billing', message: 'odd' });

    expect(event?.category).toBe(LogCategory.SYSTEM);
    expect(warn).toHaveBeenCalledWith('Unknown log category "billing", defaulting to SYSTEM.');
  });

  it('formats text lines with pipe-separated fields', () => {
    const service = createService({ LOG_FORMAT: 'text' });

    service.logEvent({
      category: LogCategory.SYNC,
      level: LogLevel.ERROR,
      message: 'Operation failed',
      identifier: 'op_id:op-1',
      metadata: { action: 'create' },
      timestamp,
    });

    expect(error).toHaveBeenCalledWith(
      '2026-03-01T10:00:00.000Z | ERROR | SYNC | op_id:op-1 | Operation failed | {"action":"create"}',
    );
  });

  it('uses a dash for a missing identifier and omits empty metadata', () => {
    const service = createService({ LOG_FORMAT: 'text' });

    expect(
      service.formatLine({
        timestamp: '2026-03-01T10:00:00.000Z',
        level: LogLevel.INFO,
        category: LogCategory.SYSTEM,
        message: 'Started',
      }),
    ).toBe('2026-03-01T10:00:00.000Z | INFO | SYSTEM | - | Started');
  });

  it('defaults security events to WARNING with their function id', () => {
    const service = createService({});

    const event = service.logSecurityEvent('Rejected token', { timestamp });

    expect(event).toMatchObject({
      level: LogLevel.WARNING,
      category: LogCategory.SECURITY,
      functionId: FN_LOG_SECURITY_EVENT,
    });
  });

  it('tags system events with the system function id', () => {
    const service = createService({});

    expect(service.logSystemEvent('Booted')?.functionId).toBe(FN_LOG_SYSTEM_EVENT);
  });
});
