// Response DTO for GET /api/health/info
import type { DatabaseStatus, InfoResult } from '../health.service';

export class InfoResponseDto {
  public readonly status: 'ok';
  public readonly timestamp: string; // ISO-8601
  public readonly uptimeSec: number;
  public readonly pid: number;
  public readonly node: string;
  public readonly env: string;
  public readonly version: string | null;
  /** Result of a `{ ping: 1 }` round-trip at request time. */
  public readonly database: DatabaseStatus;

  public constructor(args: Omit<InfoResult, 'status'>) {
    this.status = 'ok';
    this.timestamp = args.timestamp;
    this.uptimeSec = args.uptimeSec;
    this.pid = args.pid;
    this.node = args.node;
    this.env = args.env;
    this.version = args.version;
    this.database = args.database;
  }
}
