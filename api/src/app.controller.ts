import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  async getHealth(@Res() res: Response): Promise<void> {
    const dbHealth = await this.appService.checkDatabaseHealth();
    const discordHealth = this.appService.checkDiscordHealth();

    const health = {
      status: dbHealth.connected ? 'ok' : 'unhealthy',
      timestamp: new Date().toISOString(),
      db: {
        connected: dbHealth.connected,
        latencyMs: dbHealth.latencyMs,
      },
      discord: discordHealth,
    };

    res.status(dbHealth.connected ? 200 : 503).json(health);
  }
}
