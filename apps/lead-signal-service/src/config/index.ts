/**
 * Environment configuration
 */
export const config = {
  port: parseInt(process.env.PORT || "3000", 10),

  // Supabase (tenant API keys). Unset = development tenant.
  supabaseUrl: process.env.SUPABASE_URL || "",
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || "",

  // Replaces the bundled pattern catalog when set
  patternCatalogPath: process.env.PATTERN_CATALOG_PATH || "",

  batchMaxLeads: parseInt(process.env.BATCH_MAX_LEADS || "5000", 10),
  // JSON and CSV request bodies
  bodyLimit: process.env.BODY_LIMIT || "5mb",

  // Hosted text generation for /chat
  openaiApiKey: process.env.OPENAI_API_KEY || "",
  openaiModel: process.env.OPENAI_MODEL || "gpt-4o-mini",
  openaiMaxRetries: parseInt(process.env.OPENAI_MAX_RETRIES || "2", 10),

  logLevel: process.env.LOG_LEVEL || "info",
  nodeEnv: process.env.NODE_ENV || "development"
};
