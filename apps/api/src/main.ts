/* apps/api/src/main.ts */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp, getApiPrefix } from './app.bootstrap';
import { AppLogger } from './common/app-logger';
import { ORDERING_CONFIG, type OrderingConfig } from './config/ordering.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    cors: true,
  });
  configureApp(app);
  app.enableShutdownHooks();

  const { port } = app.get<OrderingConfig>(ORDERING_CONFIG);
  await app.listen(port);

  new AppLogger('Bootstrap').log(
    `API listening on http://localhost:${port}/${getApiPrefix()}`,
  );
}

void bootstrap();
