import 'reflect-metadata';
import fs from 'node:fs';
import path from 'node:path';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import pinoHttp from 'pino-http';
import { loadConfig } from './common/config';
import { LoggerService } from './common/logger.service';
import { AppModule } from './modules/app.module';

async function bootstrap() {
  const config = loadConfig();
  const app = await NestFactory.create(AppModule);

  app.use(
    pinoHttp({
      level: config.LOG_LEVEL,
    }),
  );

  app.setGlobalPrefix('api/v1');

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('flashwear API')
      .setDescription('SSD endurance analysis from smartctl snapshots')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document);

  if (config.NODE_ENV !== 'production') {
    fs.writeFileSync(path.join(process.cwd(), 'openapi.json'), JSON.stringify(document, null, 2));
  }

  await app.listen(config.API_PORT);
  app.get(LoggerService).info('API listening', { port: config.API_PORT });
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
