import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { setupApp } from './setup-app';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = setupApp(await NestFactory.create(AppModule));

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Listing Search Scoring')
    .setDescription('Constraint-gated scoring and re-ranking of real-estate listings')
    .setVersion('0.1.0')
    .build();
  SwaggerModule.setup('api/docs', app, SwaggerModule.createDocument(app, swaggerConfig));

  const port = Number(app.get(ConfigService).get<string>('PORT', '3000'));
  await app.listen(port);

  logger.log(`Listening on port ${port}, docs at /api/docs`);
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
