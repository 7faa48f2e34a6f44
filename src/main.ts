import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { readNumber } from './common/config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  // сверка освобождает аренду при остановке
  app.enableShutdownHooks();
  const port = readNumber(app.get(ConfigService), 'PORT', 3000);
  await app.listen(port);
  Logger.log(`HTTP сервер слушает порт ${port}`, 'Bootstrap');
}

bootstrap().catch((error) => {
  Logger.error('Не удалось запустить приложение', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
