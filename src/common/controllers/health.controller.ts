import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { SkipRateLimit } from '../decorators/rate-limit.decorator';
import { APP_CONSTANTS } from '../constants/app.constants';

/**
 * Health check response interface
 */
export interface HealthResponse {
  status: 'ok' | 'degraded';
  service: string;
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  checks: {
    database: { status: 'connected' | 'disconnected' };
  };
}

@ApiTags('health')
@Controller('health')
@SkipRateLimit()
export class HealthController {
  constructor(
    private readonly configService: ConfigService,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Liveness probe. Never authenticated and never rate limited; the database
   * entry only reports whether the connection was initialised.
   *
   * @example
   * GET /health
   * {
   *   "status": "ok",
   *   "service": "rider-auth-api",
   *   "timestamp": "2026-01-15T10:30:00.000Z",
   *   "uptime": 3600.5,
   *   "environment": "production",
   *   "version": "1.0.0",
   *   "checks": { "database": { "status": "connected" } }
   * }
   */
  @Get()
  @ApiOperation({
    summary: 'Health check endpoint',
    description: 'Returns the liveness of the service',
  })
  @ApiResponse({ status: 200, description: 'Service is running' })
  health(): HealthResponse {
    const connected = this.dataSource.isInitialized;

    return {
      status: connected ? 'ok' : 'degraded',
      service: APP_CONSTANTS.SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: this.configService.get<string>('app.env') ?? 'development',
      version: this.configService.get<string>('app.version') ?? '1.0.0',
      checks: {
        database: { status: connected ? 'connected' : 'disconnected' },
      },
    };
  }
}
