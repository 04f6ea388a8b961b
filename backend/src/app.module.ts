import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/index.js';
import { AiModule } from './ai/index.js';
import { CoursesModule } from './courses/index.js';
import { ToolsModule } from './tools/index.js';
import { ChatModule } from './chat/index.js';

@Module({
  imports: [AppConfigModule, AiModule, CoursesModule, ToolsModule, ChatModule],
})
export class AppModule {}
