import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import cors from '@fastify/cors';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { loadEnv } from '@fmops/config';
import { AppModule } from './app.module.js';

async function bootstrap() {
  const env = loadEnv(process.env);
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: env.LOG_LEVEL === 'silent' ? false : ['error', 'warn']
  });
  await app.register(cors, { origin: true });

  app.setGlobalPrefix('v1');
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Facilities Work Orders API')
    .setDescription('Work order lifecycle, assignment and scheduling')
    .setVersion('0.1.0')
    .addBearerAuth()
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  await app.listen(env.API_PORT, '0.0.0.0');
}

void bootstrap();
