import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_CONFIG, loadAppConfig } from './app.config';
import { validateEnvironment } from './env.validation';

@Global()
@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			envFilePath: ['.env.local', '.env'],
			cache: true,
			validate: validateEnvironment,
		}),
	],
	providers: [
		{
			provide: APP_CONFIG,
			// ConfigModule has merged the .env files into process.env by now.
			useFactory: () => loadAppConfig(process.env),
		},
	],
	exports: [APP_CONFIG],
})
export class AppConfigModule {}
