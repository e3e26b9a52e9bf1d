import { Controller, Get, Header } from '@nestjs/common';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';

@Controller()
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get('health')
  @Header('Cache-Control', 'no-store')
  public async getHealthStatus(): Promise<AppHealthStatus> {
    return this.healthService.getHealthStatus();
  }

  /** Target of the keep-alive pinger. */
  @Get('ping')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  public ping(): string {
    return 'pong';
  }
}
