import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';

export type HealthComponentState = 'up' | 'down';
export type HealthOverallStatus = 'ok' | 'error';

export interface HealthComponentSnapshot {
  state: HealthComponentState;
  latencyMs?: number;
  error?: string;
}

export interface HealthSnapshot {
  /**
   * "ok" when every component is up, otherwise "error".
   */
  status: HealthOverallStatus;
  environment: string;
  /** ISO 8601 (UTC). */
  timestamp: string;
  components: {
    database: HealthComponentSnapshot;
  };
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {}

  async checkHealth(): Promise<HealthSnapshot> {
    const database = await this.checkDatabase();

    return {
      status: database.state === 'up' ? 'ok' : 'error',
      environment: this.config.get<string>('NODE_ENV') ?? 'development',
      timestamp: new Date().toISOString(),
      components: { database },
    };
  }

  private async checkDatabase(): Promise<HealthComponentSnapshot> {
    const startedAt = Date.now();

    try {
      await this.dataSource.query('SELECT 1');
      return { state: 'up', latencyMs: Date.now() - startedAt };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Database health probe failed: ${message}`);
      return { state: 'down', latencyMs: Date.now() - startedAt, error: message };
    }
  }
}
