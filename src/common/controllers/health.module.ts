import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';

/**
 * Health check module
 *
 * Provides the unauthenticated liveness endpoint
 */
@Module({
  controllers: [HealthController],
})
export class HealthModule {}
