import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { createApp, logLevelsFor } from './app.factory.js';
import { ConfigurationError } from './config/index.js';

async function bootstrap() {
  const configService = new ConfigService();
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  const app = await createApp(logLevelsFor(nodeEnv));
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('app.port', 3000);

  try {
    await app.listen(port);
    Logger.log(
      `HTTP server listening on port ${port} (env: ${nodeEnv})`,
      'Bootstrap',
    );
  } catch (error) {
    if (
      error &&
      typeof error === 'object' &&
      'code' in error &&
      error.code === 'EADDRINUSE'
    ) {
      Logger.error(
        `Port ${port} is already in use. Please stop other instances or change the port.`,
        'Bootstrap',
      );
      process.exit(1);
    }
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  // 缺少 API Key 等配置错误属于启动期致命错误
  if (error instanceof ConfigurationError) {
    Logger.error(error.message, 'Bootstrap');
  } else {
    Logger.error(
      'Failed to start the server',
      error instanceof Error ? error.stack : String(error),
      'Bootstrap',
    );
  }
  process.exit(1);
});
