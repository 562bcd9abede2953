import { registerAs } from '@nestjs/config';

export interface DatabaseConfig {
  url: string;
  name: string;
}

export default registerAs(
  'database',
  (): DatabaseConfig => ({
    url: process.env.MONGO_URL ?? '',
    name: process.env.MONGO_DB_NAME ?? '',
  }),
);
