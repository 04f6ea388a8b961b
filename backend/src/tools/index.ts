export { ToolsModule } from './tools.module.js';
export { ToolRegistry } from './tool-registry.js';
export { ToolRegistryFactory } from './tool-registry.factory.js';
export {
  COURSE_SEARCH_TOOL_NAME,
  CourseSearchTool,
} from './course-search.tool.js';
export {
  COURSE_OUTLINE_TOOL_NAME,
  CourseOutlineTool,
  formatOutline,
} from './course-outline.tool.js';
export type { CourseTool, SourceAttribution } from './tool.types.js';
