export { DatabaseModule } from './database.module.js';
export { DatabaseService } from './database.service.js';
