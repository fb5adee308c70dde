import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadAppConfig } from './shared/config/app.config';

async function bootstrap() {
  const config = loadAppConfig();
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Structured logging
  app.useLogger(app.get(Logger));

  configureApp(app);
  app.enableCors();

  // Swagger
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Contact Service')
      .setDescription(
        'Stores contacts keyed by a structurally validated email address. ' +
          'Addresses are validated on every request body, path parameter and database read.',
      )
      .setVersion('1.0')
      .addTag('contacts', 'Contact registration and lookup')
      .addTag('health', 'Service health checks')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      tagsSorter: 'alpha',
      operationsSorter: 'alpha',
    },
  });

  await app.listen(config.port);

  const logger = app.get(Logger);
  logger.log(`Application running on http://localhost:${config.port}`);
  logger.log(`Swagger UI available at http://localhost:${config.port}/api/docs`);
}
void bootstrap();
