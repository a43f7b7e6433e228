import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
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
      service: 'holdings-ledger',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Holdings Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        update: '/holdings/update',
        snapshot: '/holdings/snapshot',
        export: '/holdings/export',
        marketPrices: '/market-prices',
      },
    };
  }
}
