/**
 * API Server Runner
 *
 * Starts the claim API backed by PostgreSQL and SPL token transfers.
 *
 * Usage:
 *   npx tsx src/runners/api-server.ts
 *
 * Environment variables:
 *   - DATABASE_URL: PostgreSQL connection string (required)
 *   - SOLANA_RPC_URL / SOLANA_RPC_URL_BACKUP: RPC endpoints
 *   - CLAIM_MINT: SPL mint paid out by claims (required)
 *   - DISTRIBUTOR_KEYPAIR: path to the keypair holding the claim tokens (required)
 *   - INITIAL_AUTHORITY: wallet seeded as authority on first start (required)
 *   - API_PORT: Port to listen on (default: 3001)
 *   - CORS_ORIGIN: Allowed origins (default: *)
 *   - MAX_PROOF_DEPTH, SIGNATURE_MAX_AGE_SECONDS, RATE_LIMIT_MAX
 */

import { startServer } from '../api';
import { createServices } from '../bootstrap';
import { getApiConfigFromEnv, getLedgerConfigFromEnv } from '../config/service';
import { closePool, getPool } from '../db';
import { getRpcConfigFromEnv } from '../utils/rpc';

function main() {
  console.log('[API Server] Starting...');

  const services = createServices(getPool(), getLedgerConfigFromEnv(), getRpcConfigFromEnv());
  const server = startServer(services, getApiConfigFromEnv());

  const shutdown = (signal: string) => {
    console.log(`[API Server] ${signal} received, shutting down`);
    server.close(() => {
      closePool()
        .catch((e: unknown) => console.error('[API Server] Pool shutdown failed:', e))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
