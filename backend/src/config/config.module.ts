import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { configuration } from './configuration.js';
import { validateEnv } from './env.validation.js';

const nodeEnv = process.env.NODE_ENV ?? 'development';

/** Env files nearest the backend win; `.env.<NODE_ENV>` overrides `.env`. */
const envFiles = [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, '.env'].flatMap(
  (file) => [file, `../${file}`],
);

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      validate: validateEnv,
      envFilePath: envFiles,
      // Jest runs read only the variables the spec file sets.
      ignoreEnvFile: nodeEnv === 'test',
    }),
  ],
})
export class NetAssistConfigModule {}
