import type { ConfigService } from '@nestjs/config';
import { ConfigurationError } from './config.errors.js';
import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // ConfigModule has already run validateEnv; parsing again gives typed defaults
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
    },
    ai: {
      provider: env.AI_PROVIDER,
      temperature: env.AI_TEMPERATURE,
      maxOutputTokens: env.AI_MAX_OUTPUT_TOKENS,
      requestTimeoutMs: env.AI_REQUEST_TIMEOUT_MS,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        chatModel: env.OPENAI_CHAT_MODEL,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      },
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL ?? false,
    },
    vectorStore: {
      driver: env.VECTOR_STORE,
      path: env.VECTOR_STORE_PATH,
      collection: env.VECTOR_COLLECTION,
    },
    retrieval: {
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
      maxResults: env.MAX_RESULTS,
      courseMatchMinScore: env.COURSE_MATCH_MIN_SCORE,
      contextWindow: env.SEARCH_CONTEXT_WINDOW,
    },
    chat: {
      maxHistory: env.MAX_HISTORY,
      maxToolRounds: env.MAX_TOOL_ROUNDS,
    },
    ingestion: {
      docsPath: env.DOCS_PATH,
      onStartup: env.INGEST_ON_STARTUP ?? true,
    },
  };
};

export type AiConfig = AppConfig['ai'];
export type DatabaseConfig = AppConfig['database'];
export type VectorStoreConfig = AppConfig['vectorStore'];
export type RetrievalConfig = AppConfig['retrieval'];
export type ChatConfig = AppConfig['chat'];
export type IngestionConfig = AppConfig['ingestion'];

export function requireConfig<K extends keyof AppConfig>(
  configService: ConfigService<AppConfig>,
  key: K,
): AppConfig[K] {
  const section = configService.get<AppConfig[K]>(key);
  if (!section) {
    throw new ConfigurationError(`${key} configuration is missing`);
  }
  return section;
}
