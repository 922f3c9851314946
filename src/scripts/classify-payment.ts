/**
 * Manual Test Script for Payment Classification
 *
 * Runs one classification against a real backend, bypassing the HTTP layer.
 * Credentials come from the same environment variables as the server.
 *
 * Usage:
 *   tsx src/scripts/classify-payment.ts "<payment text>" [options]
 *
 * Options:
 *   --categories a,b,c     Categories to choose from (default: groceries,transport,utilities,other)
 *   --model-type local     local | cloud (default: local)
 *   --model qwen2.5:1.5b   Model name (default: first valid model of the type)
 *   --search               Add web search results to the prompt (local models only)
 *
 * Example:
 *   tsx src/scripts/classify-payment.ts "SHELL OIL 5741 HOUSTON TX" --search
 *   tsx src/scripts/classify-payment.ts "NETFLIX.COM" --model-type cloud --model gemini-2.5-flash
 */

import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { ClassificationService } from '../services/classification-service.js';
import { LLMClientManager, createClientFactory } from '../services/clients/client-manager.js';
import { parseClassificationRequest } from '../services/request-validation.js';
import { createSearchService } from '../services/search-service.js';

const DEFAULT_CATEGORIES = ['groceries', 'transport', 'utilities', 'other'];

interface ScriptArgs {
  paymentText: string;
  categories: string[];
  modelType: string;
  modelName: string | undefined;
  useSearch: boolean;
}

function parseArgs(argv: string[]): ScriptArgs | null {
  const args: ScriptArgs = {
    paymentText: '',
    categories: DEFAULT_CATEGORIES,
    modelType: 'local',
    modelName: undefined,
    useSearch: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--categories':
        args.categories = (argv[++i] ?? '').split(',');
        break;
      case '--model-type':
        args.modelType = argv[++i] ?? '';
        break;
      case '--model':
        args.modelName = argv[++i];
        break;
      case '--search':
        args.useSearch = true;
        break;
      default:
        if (arg !== undefined) {
          args.paymentText = arg;
        }
    }
  }

  return args.paymentText ? args : null;
}

async function classifyPayment(args: ScriptArgs): Promise<void> {
  console.log('🧪 Payment Classification Test\n');
  console.log('='.repeat(60));

  console.log('⚙️  Loading configuration...');
  const config = await loadConfig();

  const validModels = args.modelType === 'cloud' ? config.validModels.cloud : config.validModels.local;
  const request = parseClassificationRequest(
    {
      payment_text: args.paymentText,
      categories: args.categories,
      model_type: args.modelType,
      model_name: args.modelName ?? validModels[0] ?? '',
      use_search: args.useSearch,
    },
    config.validModels
  );

  console.log(`💳 Payment: ${request.paymentText}`);
  console.log(`🏷️  Categories: ${request.categories.join(', ')}`);
  console.log(`🤖 Model: ${request.modelName} (${request.modelType})`);
  console.log(`🔎 Search: ${request.useSearch ? 'on' : 'off'}`);
  console.log('='.repeat(60));
  console.log();

  const clientManager = new LLMClientManager(createClientFactory(config));
  const searchService = createSearchService(config);
  const service = new ClassificationService(clientManager, searchService, {
    searchMaxResults: config.search.maxResults,
  });

  try {
    const result = await service.classify(request);

    console.log('📊 RESULT');
    console.log('='.repeat(60));
    console.log(`✅ Category: ${result.category}`);
    console.log(`💬 Reasoning: ${result.reasoning}`);
    console.log(`📈 Confidence: ${result.confidence ?? 'n/a'}`);
    console.log(`🔎 Search used: ${result.searchUsed ? 'yes' : 'no'}`);
    console.log(`⏱️  Processing time: ${result.processingTimeMs}ms`);
    console.log(`🆔 Correlation ID: ${result.correlationId}`);
  } finally {
    await clientManager.closeAll();
  }
}

const parsedArgs = parseArgs(process.argv.slice(2));
if (!parsedArgs) {
  console.error('Usage: tsx src/scripts/classify-payment.ts "<payment text>" [--categories a,b] [--model-type local|cloud] [--model name] [--search]');
  process.exit(1);
}

classifyPayment(parsedArgs).catch((error: unknown) => {
  console.error(`❌ Classification failed: ${errorMessage(error)}`);
  process.exit(1);
});
