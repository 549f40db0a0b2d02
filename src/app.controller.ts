import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { InstrumentRegistryService } from './market/instrument-registry.service';

@Controller()
export class AppController {
  constructor(private readonly registry: InstrumentRegistryService) {}

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
      service: 'stock-metrics',
      instruments: this.registry.size,
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
      message: 'Stock Metrics API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        instruments: '/instruments',
        trades: '/instruments/:symbol/trades',
        price: '/instruments/:symbol/price',
        dividendYield: '/instruments/:symbol/dividend-yield',
        peRatio: '/instruments/:symbol/pe-ratio',
        index: '/index',
      },
    };
  }
}
