/**
 * 应用入口文件
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { Logger } from '@nestjs/common';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);

  // 全局验证管道
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // 收到 SIGTERM 等信号时取消订阅并等待处理完成
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('port', 3000);
  await app.listen(port);

  logger.log(`🚀 Application is running on: http://localhost:${port}`);
  logger.log(`📝 Event endpoints:`);
  logger.log(`   - POST /events/pullreq/created`);
  logger.log(`   - POST /events/pullreq/reopened`);
  logger.log(`   - POST /events/pullreq/branch-updated`);
  logger.log(`   - POST /events/pullreq/closed`);
  logger.log(`   - POST /events/pullreq/merged`);
}

bootstrap().catch(error => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
