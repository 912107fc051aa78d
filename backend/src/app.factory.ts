import type { LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';

// 配置日志级别：生产环境只显示 warn 和 error，开发环境显示所有日志
export function logLevelsFor(nodeEnv: string): LogLevel[] {
  if (nodeEnv === 'production') {
    return ['error', 'warn'];
  }
  if (nodeEnv === 'test') {
    return ['error'];
  }
  return ['log', 'error', 'warn', 'debug'];
}

/**
 * 初始化失败时返回被拒绝的 Promise，而不是由 Nest 直接退出进程
 */
export function createApp(
  logger: LogLevel[],
): Promise<NestExpressApplication> {
  return NestFactory.create<NestExpressApplication>(AppModule, {
    logger,
    abortOnError: false,
  });
}
