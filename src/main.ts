import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp, SWAGGER_PATH } from './app.setup';

async function bootstrap() {
    const logger = new Logger('Bootstrap');
    const app = await NestFactory.create<NestExpressApplication>(AppModule);

    configureApp(app);

    const configService = app.get(ConfigService);
    const port = Number(configService.get<string>('PORT', '9527'));

    await app.listen(port);
    logger.log(`服务已启动: http://localhost:${port}，API 文档: /${SWAGGER_PATH}`);
}
void bootstrap();
