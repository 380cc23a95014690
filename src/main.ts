import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { json, urlencoded } from 'express';
import { AppModule } from './app.module';
import { AccountsService } from './accounts/accounts.service';
import { OpenAIExceptionFilter } from './common/filters/openai-exception.filter';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  // Module init loads the accounts file and throws ConfigError when empty
  const app = await NestFactory.create(AppModule, { bodyParser: false });

  app.use(json({ limit: '50mb' }));
  app.use(urlencoded({ extended: true, limit: '50mb' }));

  const config = new DocumentBuilder()
    .setTitle('Chat Session Relay')
    .setDescription(
      'OpenAI-compatible chat completions over a rotating pool of LibreChat accounts',
    )
    .setVersion('1.0')
    .addBearerAuth()
    .addTag('OpenAI Compatible', 'OpenAI-compatible chat completions API')
    .addTag('Models', 'Model listing')
    .addTag('Accounts', 'Pool status')
    .build();
  const documentFactory = () => SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, documentFactory);

  app.useGlobalFilters(new OpenAIExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
    }),
  );

  app.enableCors();

  const configService = app.get(ConfigService);
  const accountsService = app.get(AccountsService);
  const port = configService.get<number>('port') || 8741;

  if (configService.get<string>('proxyApiKey')) {
    logger.log('API key authentication enabled');
  }

  await app.listen(port);

  logger.log('='.repeat(60));
  logger.log(`Chat Session Relay running on http://localhost:${port}`);
  logger.log(`Accounts in rotation: ${accountsService.getAccountCount()}`);
  logger.log('');
  logger.log('Endpoints:');
  logger.log(`  POST /v1/chat/completions - Chat completion (OpenAI)`);
  logger.log(`  GET  /v1/models           - List models`);
  logger.log(`  GET  /status              - Account pool status`);
  logger.log(`  GET  /health              - Health check`);
  logger.log(`  GET  /docs                - Swagger UI`);
  logger.log('='.repeat(60));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
