import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import compression from '@fastify/compress';
import cluster from 'cluster';
import * as dotenv from 'dotenv';
import { AppModule } from './app.module';
import { configureApp, corsOptions, logLevels } from './app.setup';
import { ProvisioningModule } from './chromedriver/chromedriver.module';
import { ChromedriverService } from './chromedriver/chromedriver.service';
import { ClusterHost, ProcessManager } from './cluster/process-manager';
import { EnvironmentVariables, validateEnvironment } from './config/env.validation';
dotenv.config();

const logger = new Logger('Main');

async function provisionDriver(env: EnvironmentVariables): Promise<string | undefined> {
  if (env.SKIP_DRIVER_PROVISIONING) {
    logger.log('Driver provisioning skipped');
    return env.CHROMEDRIVER_PATH;
  }

  const context = await NestFactory.createApplicationContext(ProvisioningModule, {
    logger: logLevels(env.DEBUG),
  });
  try {
    return await context.get(ChromedriverService).provision();
  } finally {
    await context.close();
  }
}

async function runPrimary() {
  const env = validateEnvironment(process.env);
  const driverPath = await provisionDriver(env);

  const host: ClusterHost = {
    fork: (workerEnv) => cluster.fork(workerEnv),
    onExit: (listener) => {
      cluster.on('exit', listener);
    },
  };
  const manager = new ProcessManager(host, {
    workers: env.WEB_CONCURRENCY,
    env: driverPath ? { CHROMEDRIVER_PATH: driverPath } : {},
    restartDelayMs: 1000,
  });
  manager.start();

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      manager
        .stop(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
          process.exit(1);
        });
    });
  }
}

async function bootstrap() {
  const env = validateEnvironment(process.env);

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({
      logger: env.DEBUG,
    }),
    { logger: logLevels(env.DEBUG) },
  );

  await app.register(compression, {
    encodings: ['gzip', 'deflate'],
  });

  configureApp(app);
  app.enableCors(corsOptions(env.CORS_ORIGINS));
  app.enableShutdownHooks();

  await app.listen(env.PORT, env.HOST);
  logger.log(`Worker ${process.pid} listening on http://${env.HOST}:${env.PORT} (${env.ENVIRONMENT})`);
}

const entry = cluster.isPrimary ? runPrimary : bootstrap;
entry().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
