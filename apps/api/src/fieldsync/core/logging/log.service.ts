// apps/api/src/fieldsync/core/logging/log.service.ts

import { Injectable, Logger as NestLogger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fsp } from 'fs';
import * as path from 'path';

import {
  FN_LOG_SECURITY_EVENT,
  FN_LOG_SYSTEM_EVENT,
  FunctionalId,
  isFunctionalId,
} from '../functional-ids';

/**
 * Canonical log categories.
 */
export enum LogCategory {
  SYNC = 'SYNC',
  SYSTEM = 'SYSTEM',
  SECURITY = 'SECURITY',
}

/**
 * Canonical log levels.
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  CRITICAL = 'CRITICAL',
}

export type LogFormat = 'json' | 'text';

export interface LoggingConfig {
  /**
   * Minimum level to emit (DEBUG < INFO < WARNING < ERROR < CRITICAL).
   */
  level: LogLevel;
  format: LogFormat;
  /**
   * Directory for per-category log files; null disables the file sink.
   */
  logDir: string | null;
}

/**
 * Log event shape as emitted to the Nest logger and the file sink.
 */
export interface StructuredLogEvent {
  timestamp: string; // ISO8601 UTC
  level: LogLevel;
  category: LogCategory;
  message: string;
  /**
   * Optional correlation identifier (e.g. "idempotency_key:abc").
   */
  identifier?: string;
  functionId?: FunctionalId | string;
  metadata?: Record<string, unknown>;
}

export interface LogEventInput {
  /**
   * Case-insensitive category token; unknown values fall back to SYSTEM.
   */
  category: LogCategory | string;
  /**
   * Case-insensitive level token; "WARN" is treated as "WARNING".
   * Defaults to INFO.
   */
  level?: LogLevel | string;
  message: string;
  identifier?: string;
  metadata?: Record<string, unknown>;
  timestamp?: Date;
  functionId?: FunctionalId | string;
  /**
   * Forwarded into metadata.actorUserId.
   */
  actorUserId?: string;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARNING]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50,
};

const CATEGORY_FILES: Record<LogCategory, string> = {
  [LogCategory.SYNC]: 'sync_activity.log',
  [LogCategory.SYSTEM]: 'system_activity.log',
  [LogCategory.SECURITY]: 'security_events.log',
};

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);
const LOG_CATEGORIES: readonly string[] = Object.values(LogCategory);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

function isLogCategory(value: string): value is LogCategory {
  return LOG_CATEGORIES.includes(value);
}

/**
 * Core structured logging service.
 *
 * Responsibilities:
 * - Provide a single structured logEvent entry point.
 * - Enforce canonical category / level tokens.
 * - Honour a minimum log level threshold.
 * - Emit JSON or text lines through the Nest logger and, when LOG_DIR is
 *   set, append them to per-category files.
 * - Attach functional IDs and actor context to events.
 */
@Injectable()
export class LogService implements OnModuleInit {
  private readonly logger = new NestLogger(LogService.name);
  private readonly config: LoggingConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = this.buildConfigFromEnv();
  }

  async onModuleInit(): Promise<void> {
    await this.ensureLogDirectoryExists();
  }

  /**
   * Main entry point: write a structured log event.
   *
   * Fire-and-forget for the caller; file I/O failures are reported to the
   * Nest logger.
   */
  logEvent(input: LogEventInput): StructuredLogEvent | null {
    const level = this.normalizeLevel(input.level ?? LogLevel.INFO);

    if (!this.shouldLog(level)) {
      return null;
    }

    const category = this.normalizeCategory(input.category);
    const functionId = this.normalizeFunctionId(input.functionId);

    const metadata: Record<string, unknown> = { ...(input.metadata ?? {}) };
    if (functionId && metadata.functionId == null) {
      metadata.functionId = functionId;
    }
    if (input.actorUserId && metadata.actorUserId == null) {
      metadata.actorUserId = input.actorUserId;
    }

    const event: StructuredLogEvent = {
      timestamp: (input.timestamp ?? new Date()).toISOString(),
      level,
      category,
      message: input.message,
      identifier: input.identifier,
      functionId,
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    };

    const line = this.formatLine(event);

    this.logToNest(level, line);
    void this.writeToFile(category, line);

    return event;
  }

  /**
   * SYSTEM-category event; FN_LOG_SYSTEM_EVENT unless a functionId is given.
   */
  logSystemEvent(
    message: string,
    options: Omit<LogEventInput, 'category' | 'message'> = {},
  ): StructuredLogEvent | null {
    const { functionId, ...rest } = options;

    return this.logEvent({
      ...rest,
      category: LogCategory.SYSTEM,
      message,
      functionId: functionId ?? FN_LOG_SYSTEM_EVENT,
    });
  }

  /**
   * SECURITY-category event; defaults to WARNING and FN_LOG_SECURITY_EVENT.
   */
  logSecurityEvent(
    message: string,
    options: Omit<LogEventInput, 'category' | 'message'> = {},
  ): StructuredLogEvent | null {
    const { level, functionId, ...rest } = options;

    return this.logEvent({
      ...rest,
      category: LogCategory.SECURITY,
      message,
      level: level ?? LogLevel.WARNING,
      functionId: functionId ?? FN_LOG_SECURITY_EVENT,
    });
  }

  formatLine(event: StructuredLogEvent): string {
    if (this.config.format === 'json') {
      return JSON.stringify(event);
    }

    const parts: string[] = [
      event.timestamp,
      event.level,
      event.category,
      event.identifier ?? '-',
      event.message,
    ];

    if (event.metadata && Object.keys(event.metadata).length > 0) {
      parts.push(JSON.stringify(event.metadata));
    }

    return parts.join(' | ');
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private buildConfigFromEnv(): LoggingConfig {
    const envLevel = this.configService.get<string>('LOG_LEVEL');
    const envFormat = this.configService.get<string>('LOG_FORMAT');
    const envDir = this.configService.get<string>('LOG_DIR');

    return {
      level: this.normalizeLevelToken(envLevel) ?? LogLevel.INFO,
      format: envFormat && envFormat.toLowerCase() === 'text' ? 'text' : 'json',
      logDir: envDir && envDir.trim().length > 0 ? path.resolve(envDir) : null,
    };
  }

  private async ensureLogDirectoryExists(): Promise<void> {
    if (!this.config.logDir) {
      return;
    }

    try {
      await fsp.mkdir(this.config.logDir, { recursive: true });
    } catch (error) {
      this.logger.error(
        `Failed to ensure log directory "${this.config.logDir}": ${errorMessage(error)}`,
      );
    }
  }

  private normalizeLevelToken(token?: string | null): LogLevel | undefined {
    if (!token) {
      return undefined;
    }

    const upper = token.toUpperCase().trim();
    if (upper === 'WARN') {
      return LogLevel.WARNING;
    }
    if (isLogLevel(upper)) {
      return upper;
    }

    this.logger.warn(`Unknown log level token "${token}", falling back to default.`);
    return undefined;
  }

  private normalizeLevel(level: LogLevel | string): LogLevel {
    return isLogLevel(level) ? level : this.normalizeLevelToken(level) ?? LogLevel.INFO;
  }

  private normalizeCategory(category: LogCategory | string): LogCategory {
    const upper = category.toUpperCase().trim();
    if (isLogCategory(upper)) {
      return upper;
    }

    this.logger.warn(`Unknown log category "${category}", defaulting to SYSTEM.`);
    return LogCategory.SYSTEM;
  }

  private normalizeFunctionId(
    functionId?: FunctionalId | string,
  ): FunctionalId | string | undefined {
    const token = functionId?.trim();
    if (!token) {
      return undefined;
    }

    if (!isFunctionalId(token)) {
      this.logger.warn(`Non-canonical functionalId "${token}" used in log event.`);
    }
    return token;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.config.level];
  }

  private logToNest(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        this.logger.debug(message);
        break;
      case LogLevel.INFO:
        this.logger.log(message);
        break;
      case LogLevel.WARNING:
        this.logger.warn(message);
        break;
      case LogLevel.ERROR:
      case LogLevel.CRITICAL:
        this.logger.error(message);
        break;
    }
  }

  private async writeToFile(category: LogCategory, line: string): Promise<void> {
    if (!this.config.logDir) {
      return;
    }

    const filePath = path.join(this.config.logDir, CATEGORY_FILES[category]);

    try {
      await fsp.appendFile(filePath, line + '\n', { encoding: 'utf8' });
    } catch (error) {
      this.logger.error(`Failed to write log file "${filePath}": ${errorMessage(error)}`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
