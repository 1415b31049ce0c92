/**
 * Express Server - entrypoint
 * Routes live in handlers/, ledger semantics in ledger/
 */
import 'dotenv/config';
import { initializeDatabase, closeDatabase } from './database.js';
import { createApp } from './app.js';
import { LEDGER_CONFIG, SERVER_CONFIG } from './config.js';
import { Registry } from './ledger/registry.js';

console.log('[Server] Initializing database...');
initializeDatabase();

const registry = new Registry();
const app = createApp(registry);

if (LEDGER_CONFIG.faucetEnabled) {
  console.warn('[Server] Faucet is enabled: anyone can mint ledger funds');
}

const server = app.listen(SERVER_CONFIG.port, SERVER_CONFIG.host, () => {
  console.log(`[Server] Running on http://${SERVER_CONFIG.host}:${SERVER_CONFIG.port}`);
  console.log(`[Server] Registry ${registry.identity}, fee ${registry.getFeeBps()} bps, treasury ${registry.getTreasury()}`);
});

server.timeout = SERVER_CONFIG.timeout;
server.keepAliveTimeout = SERVER_CONFIG.keepAliveTimeout;
server.headersTimeout = SERVER_CONFIG.headersTimeout;

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down gracefully...`);
  server.close(() => {
    console.log('[Server] HTTP server closed');
    closeDatabase();
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
