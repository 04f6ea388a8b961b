import { Module } from '@nestjs/common';
import { CoursesModule } from '../courses/index.js';
import { ToolRegistryFactory } from './tool-registry.factory.js';

@Module({
  imports: [CoursesModule],
  providers: [ToolRegistryFactory],
  exports: [ToolRegistryFactory],
})
export class ToolsModule {}
