export { ChatModule } from './chat.module.js';
export { ChatService, type CourseStats, type QueryAnswer } from './chat.service.js';
export { GenerationError } from './chat.errors.js';
export { SessionService, type ConversationTurn } from './session.service.js';
export { ToolOrchestratorService } from './tool-orchestrator.service.js';
