import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { API_PREFIX, configureApp } from './app.setup';
import { readLoggingConfig, resolveLogLevels } from './config/logging.config';
import { readDatabaseConfig, readServerConfig } from './config/app.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const { level } = readLoggingConfig();

  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(level),
    // let a storage initialization failure reach the catch below
    abortOnError: false,
  });

  const configService = app.get(ConfigService);
  const serverConfig = readServerConfig(configService);
  const databaseConfig = readDatabaseConfig(configService);

  app.enableCors({
    origin: serverConfig.corsOrigins.includes('*') ? true : serverConfig.corsOrigins,
    credentials: true,
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
  });
  configureApp(app);
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Alarm Rule Service')
      .setDescription('Threshold alarm rules for telemetry, status, control and adjustment points')
      .setVersion('1.0.0')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  await app.listen(serverConfig.port);

  logger.log(`Alarm rule service running on port ${serverConfig.port}`);
  logger.log(`API available at http://localhost:${serverConfig.port}/${API_PREFIX}`);
  logger.log(`Rule database: ${databaseConfig.path}`);
  logger.log(`Message bus: ${serverConfig.messageBus.host}:${serverConfig.messageBus.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start alarm rule service',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
