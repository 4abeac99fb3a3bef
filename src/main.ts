import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './config/app.config';

async function bootstrap() {
	// The request pipeline reads bodies itself, after the rate-limit check.
	const app = await NestFactory.create(AppModule, { bodyParser: false });
	const config = app.get<AppConfig>(APP_CONFIG);
	const logger = new Logger('Bootstrap');

	app.enableCors({
		origin: config.corsOrigin,
		methods: ['GET', 'POST', 'OPTIONS'],
		allowedHeaders: ['Content-Type', 'Authorization', 'X-Trace-Id', 'X-Request-Id'],
		exposedHeaders: ['X-Trace-Id', 'Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
	});

	const document = SwaggerModule.createDocument(
		app,
		new DocumentBuilder()
			.setTitle('Inference Gateway API')
			.setDescription('Chat / completion / embedding behind admission control')
			.setVersion('1.0')
			.addBearerAuth()
			.build(),
	);
	SwaggerModule.setup('docs', app, document);

	app.enableShutdownHooks();

	await app.listen(config.port, config.host);

	logger.log(`Application started on ${config.host}:${config.port}`);
	logger.log(
		`Admission: ${config.maxConcurrentRequests} concurrent, rate limit ${config.defaultRateLimit.maxRequests}/${config.defaultRateLimit.windowSeconds}s (chat ${config.chatRateLimit.maxRequests})`,
	);
}

bootstrap().catch((error) => {
	console.error('Failed to start application:', error);
	process.exit(1);
});
