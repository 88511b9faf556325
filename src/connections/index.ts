// Database
export { pool, connectDatabase, pingDatabase } from './db/connection';

// Redis
export { redisClient, connectRedis, disconnectRedis } from './redis/redis.connection';

// Config - All configurations in one place
export { appConfig, emailConfig, dbConfig, redisConfig, storageConfig, seedConfig } from './config/app.config';
