import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { configuration } from './configuration.js';
import { validateEnv } from './env.validation.js';

// Resolved against the working directory: repository root first, then backend/
const ENV_FILES = [
  '.env.local',
  '.env',
  'backend/.env.local',
  'backend/.env',
];

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [configuration],
      validate: (env) => validateEnv(env),
      envFilePath: ENV_FILES,
      expandVariables: true,
    }),
  ],
})
export class AppConfigModule {}
