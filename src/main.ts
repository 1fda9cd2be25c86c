import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DataSource } from 'typeorm';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const dataSource = app.get(DataSource);
  if (process.env.NODE_ENV !== 'production') {
    await dataSource.runMigrations();
  }

  // ---- Swagger config ----
  const config = new DocumentBuilder()
    .setTitle('Pharmacy POS API')
    .setDescription('Medicine inventory, cart pricing and sale recording')
    .setVersion('1.0')
    .addApiKey(
      { type: 'apiKey', name: 'x-session-id', in: 'header' },
      'session-id',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document);
  // ---- Swagger done ----

  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    'Failed to start application',
    error instanceof Error && error.stack ? error.stack : String(error),
    'Bootstrap',
  );
  process.exit(1);
});
