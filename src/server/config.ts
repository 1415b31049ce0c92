// ============================================================================
// BACKEND CONFIGURATION
// Server-side configuration with environment variable overrides
// Loaded once at startup; the entrypoint imports 'dotenv/config' before this file
// ============================================================================

// ============================================================================
// LEDGER CONFIGURATION
// ============================================================================

export const LEDGER_CONFIG = {
  databasePath: process.env.LEDGER_DB_PATH || './data/ledger.db',

  // Identity the registry signs its calls into project instances with
  registryIdentity: process.env.LEDGER_REGISTRY_IDENTITY || 'registry',

  // Granted platform_admin + project_creator when the database is empty
  bootstrapAdmin: process.env.LEDGER_BOOTSTRAP_ADMIN || 'platform-admin',
  treasury: process.env.LEDGER_TREASURY || 'platform-treasury',

  // Fees are basis points: 10000 = 100%
  defaultFeeBps: parseInt(process.env.LEDGER_DEFAULT_FEE_BPS || '250', 10),
  maxFeeBps: 5000,
  bpsDenominator: 10000n,

  // Same threshold for every asset, whatever its decimals
  minDonation: 10n,

  // Lets anyone mint native funds through the HTTP API (local development only)
  faucetEnabled: process.env.LEDGER_FAUCET_ENABLED === 'true',
} as const;

// ============================================================================
// SERVER CONFIGURATION
// ============================================================================

export const SERVER_CONFIG = {
  port: parseInt(process.env.PORT || '3001', 10),
  host: process.env.HOST || 'localhost',

  // Timeouts (in milliseconds)
  timeout: parseInt(process.env.SERVER_TIMEOUT_MS || '30000', 10),
  keepAliveTimeout: parseInt(process.env.KEEP_ALIVE_TIMEOUT_SEC || '65', 10) * 1000,
  headersTimeout: parseInt(process.env.HEADERS_TIMEOUT_SEC || '66', 10) * 1000,

  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '16kb',
} as const;

// ============================================================================
// RATE LIMITING CONFIGURATION
// ============================================================================

export const RATE_LIMIT_CONFIG = {
  windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
  maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '120', 10),
  cleanupIntervalMs: parseInt(process.env.RATE_LIMIT_CLEANUP_MS || '600000', 10), // 10 minutes
} as const;
