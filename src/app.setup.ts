/**
 * 文件路径: src/app.setup.ts
 * 文件描述: 全局过滤器、管道、CORS 与 Swagger 配置。main.ts 与 e2e 测试共用，保证两者行为一致。
 */
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

export const SWAGGER_PATH = 'api-docs';

export function configureApp(app: INestApplication): void {
    const httpAdapterHost = app.get(HttpAdapterHost);
    app.useGlobalFilters(new AllExceptionsFilter(httpAdapterHost));

    app.useGlobalPipes(
        new ValidationPipe({
            whitelist: true,
            transform: true,
        }),
    );

    app.enableCors({
        origin: true,
        credentials: true,
    });

    const config = new DocumentBuilder()
        .setTitle('Sourdough Calculator API')
        .setDescription('Baker\'s percentage to ingredient weight calculator')
        .setVersion('1.0')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(SWAGGER_PATH, app, document);
}
