// Request body parsing for the claim and admin routes

import { Request } from 'express';
import { ClaimError } from '../claims/types';
import { MAX_AMOUNT } from '../merkle/types';
import { parseDigestHex } from '../merkle/verifier';
import { isValidWalletAddress } from '../utils/wallet';
import { createError, fromClaimError } from './middleware/error-handler';

export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw createError('Request body must be a JSON object', 400, 'INVALID_REQUEST');
  }
  return Object.fromEntries(Object.entries(body));
}

export function requireWallet(value: unknown, field: string): string {
  if (!isValidWalletAddress(value)) {
    throw createError(`Invalid ${field} address`, 400, 'INVALID_ADDRESS');
  }
  return value;
}

/**
 * Raw token units as a decimal string, 1..u64 max
 */
export function parseAmount(value: unknown): bigint {
  if (typeof value !== 'string' || !/^\d{1,20}$/.test(value)) {
    throw createError('amount must be a decimal string', 400, 'INVALID_AMOUNT');
  }
  const amount = BigInt(value);
  if (amount <= 0n || amount > MAX_AMOUNT) {
    throw createError('amount out of range', 400, 'INVALID_AMOUNT');
  }
  return amount;
}

/**
 * Proof nodes as hex strings. Nodes that are not 32-byte digests
 * cannot be part of any valid path, so they fail as an invalid proof.
 */
export function parseProof(value: unknown): Buffer[] {
  if (!Array.isArray(value)) {
    throw createError('proof must be an array of hex strings', 400, 'INVALID_REQUEST');
  }

  const nodes: Buffer[] = [];
  for (const item of value) {
    const node = parseDigestHex(item);
    if (!node) {
      throw fromClaimError(new ClaimError('InvalidProof', 'Proof contains a malformed node'));
    }
    nodes.push(node);
  }
  return nodes;
}

export function parseRoot(value: unknown): Buffer {
  const root = parseDigestHex(value);
  if (!root) {
    throw createError('root must be a 32-byte hex digest', 400, 'INVALID_REQUEST');
  }
  return root;
}
