import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UsersModule } from './modules/users/users.module';
import { AuthModule } from './modules/auth/auth.module';
import { User } from './modules/users/entities/user.entity';
import { HealthModule } from './common/controllers/health.module';
import { CommonModule } from './common/common.module';
import { RateLimitGuard } from './common/guards/rate-limit.guard';
import config, { validateEnv } from './config';

/**
 * Root application module
 *
 * Wires configuration, the MongoDB connection, the shared rate limiter and
 * the feature modules. The rate limit guard is global and runs before any
 * controller-level guard.
 */
@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [...config],
      validate: validateEnv,
    }),

    // Database
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'mongodb',
        url: configService.getOrThrow<string>('database.url'),
        database: configService.getOrThrow<string>('database.name'),
        entities: [User],
        // creates the unique indexes on uuid, email and userName
        synchronize: true,
        logging: configService.get<string>('app.env') === 'development',
      }),
    }),

    CommonModule,

    // Feature modules
    UsersModule,
    AuthModule,

    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: RateLimitGuard,
    },
  ],
})
export class AppModule {}
