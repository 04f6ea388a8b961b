import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AiModule } from '../ai/index.js';
import { requireConfig, type AppConfig } from '../config/index.js';
import { CoursesModule } from '../courses/index.js';
import { ToolsModule } from '../tools/index.js';
import { CHAT_CONFIG } from './chat.constants.js';
import { ChatController } from './chat.controller.js';
import { ChatService } from './chat.service.js';
import { SessionService } from './session.service.js';
import { ToolOrchestratorService } from './tool-orchestrator.service.js';

@Module({
  imports: [AiModule, CoursesModule, ToolsModule],
  providers: [
    {
      provide: CHAT_CONFIG,
      useFactory: (configService: ConfigService<AppConfig>) =>
        requireConfig(configService, 'chat'),
      inject: [ConfigService],
    },
    SessionService,
    ToolOrchestratorService,
    ChatService,
  ],
  controllers: [ChatController],
  exports: [ChatService],
})
export class ChatModule {}
