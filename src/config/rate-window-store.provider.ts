import { FactoryProvider, Logger } from '@nestjs/common';
import { Redis } from 'ioredis';
import { InMemoryRateWindowStore } from '../services/rate-limit/in-memory-rate-window.store';
import { RATE_WINDOW_STORE, RateWindowStore } from '../services/rate-limit/rate-window.store';
import { RedisRateWindowStore } from '../services/rate-limit/redis-rate-window.store';
import { APP_CONFIG, AppConfig } from './app.config';

export const RateWindowStoreProvider: FactoryProvider<RateWindowStore> = {
	provide: RATE_WINDOW_STORE,
	inject: [APP_CONFIG],
	useFactory: (config: AppConfig) => {
		const logger = new Logger('RateWindowStore');

		if (config.rateLimitStore === 'redis') {
			const redis = new Redis({
				host: config.redis.host,
				port: config.redis.port,
				password: config.redis.password,
				db: config.redis.db,
				lazyConnect: true,
				maxRetriesPerRequest: 1,
			});
			redis.on('error', (err: Error) => logger.error(`Redis error: ${err.message}`));
			logger.log(`Using Redis rate windows at ${config.redis.host}:${config.redis.port}`);
			return new RedisRateWindowStore(redis);
		}

		logger.log('Using in-memory rate windows');
		return new InMemoryRateWindowStore({ idleWindows: config.rateLimitIdleWindows });
	},
};
