import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { ClassificationService } from './services/classification-service.js';
import { LLMClientManager, createClientFactory } from './services/clients/client-manager.js';
import { createSearchService } from './services/search-service.js';

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  // Load configuration
  const config = await loadConfig();

  const clientManager = new LLMClientManager(createClientFactory(config));

  const searchService = createSearchService(config);

  const classifier = new ClassificationService(clientManager, searchService, {
    searchMaxResults: config.search.maxResults,
  });

  const app = createApp(config, classifier);

  // Start server
  const server = app.listen(config.port, () => {
    console.info(`Server listening on port ${config.port}`);
    console.info(`Project: ${config.projectId ?? '(none)'}`);
    console.info(`Region: ${config.region}`);
    console.info(`Web search: ${searchService ? 'ENABLED' : 'DISABLED'}`);
  });

  const shutdown = (signal: string): void => {
    console.info(`Received ${signal}, shutting down`);
    server.close(() => {
      clientManager
        .closeAll()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// Run the application
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
