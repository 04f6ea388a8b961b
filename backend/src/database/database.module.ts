import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { requireConfig, type AppConfig } from '../config/index.js';
import { DATABASE_CONFIG } from './database.constants.js';
import { DatabaseService } from './database.service.js';

@Module({
  providers: [
    {
      provide: DATABASE_CONFIG,
      useFactory: (configService: ConfigService<AppConfig>) =>
        requireConfig(configService, 'database'),
      inject: [ConfigService],
    },
    DatabaseService,
  ],
  exports: [DatabaseService],
})
export class DatabaseModule {}
