import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { AppConfigService } from '../app/app-config.service';
import { DatabaseService } from '../database/database.service';

@Controller('healthz')
export class HealthController {
  constructor(
    private readonly db: DatabaseService,
    private readonly appConfig: AppConfigService,
  ) {}

  @Get()
  async health(@Res({ passthrough: true }) httpRes: Response) {
    httpRes.setHeader('Cache-Control', 'no-store');
    const now = new Date();
    const nowIso = now.toISOString();
    const uptimeSeconds = Math.max(0, Math.floor(process.uptime()));
    const nodeEnv = this.appConfig.nodeEnv();

    try {
      // Readiness-style check: the pool can run a trivial query.
      const latencyMs = await this.db.ping();
      return {
        data: { status: 'ok', nowIso, uptimeSeconds, service: 'quill-api', nodeEnv, db: { status: 'ok', latencyMs } },
      };
    } catch (err) {
      return {
        data: {
          status: 'degraded',
          nowIso,
          uptimeSeconds,
          service: 'quill-api',
          nodeEnv,
          db: { status: 'down', error: err instanceof Error ? err.message : String(err) },
        },
      };
    }
  }
}
