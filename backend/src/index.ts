// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { loadKnowledgeBase } from './services/knowledgeBase';
import { InMemorySessionStore } from './services/sessionStore';
import { LocalImageStorage } from './services/storageService';
import { logAppEvent, logError } from './utils/logger';

function main(): void {
  // Config and KB problems are fatal before we accept traffic
  const config = loadConfig();
  const kb = loadKnowledgeBase(config.knowledgeBasePath);
  logAppEvent('Knowledge base loaded', {
    path: config.knowledgeBasePath,
    conditions: kb.conditions.length,
    synonyms: Object.keys(kb.synonyms).length,
    redFlags: kb.redFlagKeywords.length,
  });

  const images = new LocalImageStorage(config.uploadDir);
  images.ensureDirectory();

  const app = createApp({
    config,
    kb,
    sessions: new InMemorySessionStore(config.maxSessions),
    images,
  });
  const server = http.createServer(app);

  server.listen(config.port, config.host, () => {
    logAppEvent('Server started', { host: config.host, port: config.port, env: config.nodeEnv });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logAppEvent('Shutting down', { signal });
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  const err = error instanceof Error ? error : new Error(String(error));
  logError('Startup failed', err);
  process.exitCode = 1;
}
