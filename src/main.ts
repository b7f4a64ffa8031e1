import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './modules/app/app.module';
import { AppConfigService } from './modules/app/app-config.service';
import { configureHttpApp } from './modules/app/configure-http';
import { grpcOptions } from './modules/rpc/grpc.options';

async function bootstrap() {
  const startup = new Logger('Startup');
  // Body parsing is installed by configureHttpApp so its errors use the API envelope.
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bodyParser: false, bufferLogs: true });

  const appConfig = app.get(AppConfigService);
  app.useLogger(appConfig.logLevels());

  configureHttpApp(app, appConfig);

  const grpc = appConfig.grpc();
  app.connectMicroservice(grpcOptions(grpc));
  app.enableShutdownHooks();

  const http = appConfig.http();
  startup.log(
    [
      `nodeEnv=${appConfig.nodeEnv()}`,
      `httpPort=${http.port}`,
      `grpcUrl=${grpc.url}`,
      `allowedOrigins=${appConfig.allowedOrigins().join(',') || '(none)'}`,
      `httpConcurrency=${http.concurrencyLimit}`,
      `grpcConcurrency=${grpc.concurrencyLimit}`,
    ].join(' | '),
  );

  try {
    await app.startAllMicroservices();
    await app.listen(http.port);
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${http.port} or ${grpc.url} is already in use.`);
    } else {
      startup.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
