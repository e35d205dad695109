import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { loadTcpOptions, TcpOptions } from './config/outline.config';

// The microservice needs its address before the app module is created
async function resolveTcpOptions(): Promise<TcpOptions> {
  const context = await NestFactory.createApplicationContext(
    ConfigModule.forRoot({ envFilePath: '.env' }),
    { logger: false },
  );
  const options = loadTcpOptions(context.get(ConfigService));
  await context.close();
  return options;
}

async function bootstrap() {
  const { host, port } = await resolveTcpOptions();

  const app = await NestFactory.createMicroservice<MicroserviceOptions>(
    AppModule,
    {
      transport: Transport.TCP,
      options: { host, port },
      bufferLogs: true,
    },
  );
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();
  const logger = app.get(Logger);

  await app.listen();
  logger.log(`📡 Outline TCP microservice is running on ${host}:${port}`);
}

void bootstrap();
