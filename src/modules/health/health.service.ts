import { Injectable, Logger } from '@nestjs/common';
import { MongodbService } from '../mongodb/mongodb.service';

export interface PingResult {
  ok: true;
  timestamp: string; // ISO-8601 timestamp
  epochMs: number;
  uptimeSec: number;
}

export type DatabaseStatus = 'up' | 'down';

export interface InfoResult {
  status: 'ok';
  timestamp: string; // ISO-8601 timestamp
  uptimeSec: number;
  pid: number;
  node: string;
  env: string;
  version: string | null;
  database: DatabaseStatus;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  public constructor(private readonly mongo: MongodbService) {}

  public ping(): PingResult {
    const now = new Date();
    return {
      ok: true,
      timestamp: now.toISOString(),
      epochMs: now.getTime(),
      uptimeSec: Math.floor(process.uptime()),
    };
  }

  /** Process facts plus a database round-trip; a failed ping reports `down`. */
  public async info(): Promise<InfoResult> {
    const database = await this.databaseStatus();
    const now = new Date();
    const version = process.env.APP_VERSION || null;

    return {
      status: 'ok',
      timestamp: now.toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      pid: process.pid,
      node: process.version,
      env: process.env.NODE_ENV || 'development',
      version,
      database,
    };
  }

  private async databaseStatus(): Promise<DatabaseStatus> {
    try {
      return (await this.mongo.ping()) ? 'up' : 'down';
    } catch (err) {
      this.logger.warn(
        `Database ping failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return 'down';
    }
  }
}
