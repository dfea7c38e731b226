// src/config/service.ts
// Service configuration from environment variables

import 'dotenv/config';
import fs from 'fs';
import { Keypair } from '@solana/web3.js';
import { DEFAULT_MAX_PROOF_DEPTH } from '../merkle/types';
import { isValidWalletAddress } from '../utils/wallet';

export interface ApiConfig {
  port: number;
  corsOrigin: string;
  signatureMaxAgeSeconds: number;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

export interface LedgerConfig {
  claimMint: string;
  distributorKeypairPath: string;
  initialAuthority: string;
  maxProofDepth: number;
  computeUnitPrice: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function requiredWallet(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing ${name} environment variable`);
  }
  if (!isValidWalletAddress(value)) {
    throw new Error(`${name} is not a valid address: ${value}`);
  }
  return value;
}

export function getApiConfigFromEnv(): ApiConfig {
  return {
    port: intFromEnv('API_PORT', 3001),
    corsOrigin: process.env.CORS_ORIGIN || '*',
    signatureMaxAgeSeconds: intFromEnv('SIGNATURE_MAX_AGE_SECONDS', 300),
    rateLimitMax: intFromEnv('RATE_LIMIT_MAX', 60),
    rateLimitWindowMs: 60 * 1000,
  };
}

export function getLedgerConfigFromEnv(): LedgerConfig {
  const distributorKeypairPath = process.env.DISTRIBUTOR_KEYPAIR;
  if (!distributorKeypairPath) {
    throw new Error('Missing DISTRIBUTOR_KEYPAIR environment variable');
  }

  return {
    claimMint: requiredWallet('CLAIM_MINT'),
    distributorKeypairPath,
    initialAuthority: requiredWallet('INITIAL_AUTHORITY'),
    maxProofDepth: intFromEnv('MAX_PROOF_DEPTH', DEFAULT_MAX_PROOF_DEPTH),
    computeUnitPrice: intFromEnv('COMPUTE_UNIT_PRICE', 1000),
  };
}

/**
 * Load a keypair from a solana-keygen JSON file
 */
export function loadKeypair(filePath: string): Keypair {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!Array.isArray(raw) || !raw.every((n): n is number => typeof n === 'number')) {
    throw new Error(`Keypair file ${filePath} must be a JSON array of numbers`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}
