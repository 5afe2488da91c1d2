import { config } from "./config";
import { loadPatternCatalog, PatternCatalog } from "./catalog/patternCatalog";
import { createLeadChatAgent } from "./services/chat";
import { OpenAITextGenerator } from "./services/llm";
import { ConfigurationError } from "./errors";
import { createApp } from "./app";

// Catalog problems are fatal: never serve scores from a partial catalog
let catalog: PatternCatalog;
try {
  catalog = loadPatternCatalog(config.patternCatalogPath || undefined);
} catch (error) {
  if (error instanceof ConfigurationError) {
    console.error(`[server] Cannot start, pattern catalog failed to load: ${error.message}`);
  } else {
    console.error(`[server] Cannot start:`, error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

const answerer = config.openaiApiKey
  ? createLeadChatAgent(new OpenAITextGenerator({
      apiKey: config.openaiApiKey,
      model: config.openaiModel,
      maxRetries: config.openaiMaxRetries,
    }))
  : null;

const app = createApp({ catalog, answerer });

// Start server
app.listen(config.port, () => {
  console.log(`[server] Lead Signal Scoring Service started`);
  console.log(`[server] Port: ${config.port}`);
  console.log(`[server] Environment: ${config.nodeEnv}`);
  console.log(`[server] Pattern catalog: ${catalog.version}`);
  console.log(`[server] Tenant auth: ${config.supabaseUrl ? "supabase" : "development tenant"}`);
  console.log(`[server] Chat: ${answerer ? `enabled (${config.openaiModel})` : "disabled"}`);
});

export default app;
