import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { ReplayConfigService } from './config/replay-config.service';

@Controller()
export class AppController {
  constructor(private readonly configService: ReplayConfigService) {}

  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'corpus-tax-replay',
      version: '1.0.0',
    };
  }

  /**
   * API root - returns service info, defaults and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    const config = this.configService.get();
    return {
      message: 'Corpus Tax Replay API',
      version: '1.0.0',
      defaults: {
        initialCapital: config.initialCapital,
        maxStocks: config.maxStocks,
        stockLimitPolicy: config.stockLimitPolicy,
      },
      endpoints: {
        health: '/health',
        replay: 'POST /replay',
      },
    };
  }
}
