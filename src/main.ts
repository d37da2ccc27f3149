import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const swaggerPath = process.env.SWAGGER_PATH ?? 'docs';
  const config = new DocumentBuilder()
    .setTitle('lanes-ci API')
    .setDescription('Matrix build-verification pipelines: fan-out into lanes, fail-fast stages, backed by PostgreSQL')
    .setVersion('0.1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(swaggerPath, app, document);

  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  Logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err), 'Bootstrap');
  process.exitCode = 1;
});
