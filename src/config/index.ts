import databaseConfig from './database.config';
import jwtConfig from './jwt.config';
import appConfig from './app.config';
import rateLimitConfig from './rate-limit.config';
import securityConfig from './security.config';

export { validateEnv } from './env.validation';

export default [databaseConfig, jwtConfig, appConfig, rateLimitConfig, securityConfig];
