// src/bootstrap.ts
// Wires the PostgreSQL stores, authority registry, SPL ledger and claim ledger

import { PublicKey } from '@solana/web3.js';
import { Pool } from 'pg';
import { AuthorityRegistry } from './access/authority';
import { PgGovernanceStore, pgDatabase } from './access/stores';
import { AdminService } from './claims/admin';
import { ClaimLedger } from './claims/ledger';
import { PgClaimStore } from './claims/pg-store';
import { LedgerConfig, loadKeypair } from './config/service';
import { SplTokenLedger } from './token/spl-ledger';
import { FailoverConnection, RpcConfig } from './utils/rpc';

export interface Services {
  ledger: ClaimLedger;
  authority: AuthorityRegistry;
  admin: AdminService;
  tokens: SplTokenLedger;
  checkStore: () => Promise<void>;
}

export function createServices(pool: Pool, config: LedgerConfig, rpcConfig: RpcConfig): Services {
  const distributor = loadKeypair(config.distributorKeypairPath);

  const tokens = new SplTokenLedger({
    rpc: new FailoverConnection(rpcConfig),
    distributor,
    mint: new PublicKey(config.claimMint),
    computeUnitPrice: config.computeUnitPrice,
  });

  const authority = new AuthorityRegistry(new PgGovernanceStore(pgDatabase(pool), config.initialAuthority));

  const ledger = new ClaimLedger({
    store: new PgClaimStore(pool),
    tokens,
    access: authority,
    maxProofDepth: config.maxProofDepth,
  });

  const admin = new AdminService({
    ledger,
    authority,
    sweeper: tokens,
    claimMint: config.claimMint,
  });

  console.log(`[Bootstrap] Distributor: ${distributor.publicKey.toBase58()}`);
  console.log(`[Bootstrap] Claim mint:  ${config.claimMint}`);

  return {
    ledger,
    authority,
    admin,
    tokens,
    checkStore: async () => {
      await pool.query('SELECT 1');
    },
  };
}
