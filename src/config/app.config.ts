import { registerAs } from '@nestjs/config';

export interface AppConfig {
  port: number;
  env: string;
  version: string;
  logLevel: string;
  allowedOrigins: string[];
}

export default registerAs(
  'app',
  (): AppConfig => ({
    port: parseInt(process.env.PORT ?? '3000', 10),
    env: process.env.NODE_ENV ?? 'development',
    version: process.env.APP_VERSION ?? '1.0.0',
    logLevel: process.env.LOG_LEVEL ?? 'info',
    allowedOrigins: (process.env.ALLOWED_ORIGINS ?? 'http://localhost:3000,http://localhost:3001')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
  }),
);
