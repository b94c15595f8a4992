import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig, enabledLogLevels, loadConfig } from './config/app.config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

async function bootstrap(): Promise<void> {
  // parsed up front so bad settings fail before Nest starts
  const bootConfig = loadConfig(process.env);

  const app = await NestFactory.create(AppModule, {
    logger: enabledLogLevels(bootConfig.logLevel),
  });
  const config = app.get<AppConfig>(APP_CONFIG);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`Portfolio ledger listening on port ${config.port} (${config.nodeEnv})`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error('Failed to start portfolio ledger', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exitCode = 1;
});
