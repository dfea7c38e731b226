import { Request, Response, NextFunction, RequestHandler } from 'express';
import { PublicKey } from '@solana/web3.js';
import nacl from 'tweetnacl';
import bs58 from 'bs58';
import { isValidWalletAddress } from '../../utils/wallet';
import { createError } from './error-handler';

export const SIGNED_MESSAGE_PREFIX = 'merkle-claim-ledger';

export type SignedValue = string | readonly string[];

/**
 * Canonical text a wallet signs to authorise a request:
 *
 *   merkle-claim-ledger
 *   action=<action>
 *   <field>=<value>      one line per field, keys sorted, arrays joined with ","
 *   timestamp=<unix seconds>
 */
export function buildSignedMessage(
  action: string,
  params: Record<string, SignedValue>,
  timestamp: number
): string {
  const lines = [SIGNED_MESSAGE_PREFIX, `action=${action}`];

  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    lines.push(`${key}=${typeof value === 'string' ? value : value.join(',')}`);
  }

  lines.push(`timestamp=${timestamp}`);
  return lines.join('\n');
}

function toSignedValue(value: unknown): SignedValue | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  return null;
}

/**
 * Check an ed25519 detached signature (base58) by `wallet`
 */
export function verifyWalletSignature(message: string, signature: string, wallet: string): boolean {
  let sigBytes: Uint8Array;
  try {
    sigBytes = bs58.decode(signature);
  } catch {
    return false;
  }
  if (sigBytes.length !== nacl.sign.signatureLength) return false;

  const pubkeyBytes = new PublicKey(wallet).toBytes();
  return nacl.sign.detached.verify(new TextEncoder().encode(message), sigBytes, pubkeyBytes);
}

/**
 * Read the verified caller set by requireSignature
 */
export function getCaller(res: Response): string {
  const caller: unknown = res.locals.caller;
  if (typeof caller !== 'string') {
    throw createError('Request is not signed', 401, 'UNSIGNED_REQUEST');
  }
  return caller;
}

/**
 * Signed messages already accepted, held until their timestamp leaves the
 * accepted window. Expired entries are dropped lazily.
 */
export class ReplayGuard {
  private seen = new Map<string, number>();

  /**
   * Record `key` and return true, or return false if it is already held
   */
  accept(key: string, expiresAt: number, now: number): boolean {
    for (const [held, expiry] of this.seen) {
      if (expiry < now) this.seen.delete(held);
    }

    if (this.seen.has(key)) return false;
    this.seen.set(key, expiresAt);
    return true;
  }
}

/**
 * Authenticate the body's `wallet` by its signature over `action`,
 * the listed body fields and a recent timestamp. Each signed message is
 * accepted once per wallet.
 */
export function requireSignature(
  action: string,
  fields: readonly string[],
  maxAgeSeconds: number,
  now: () => number = Date.now
): RequestHandler {
  const replays = new ReplayGuard();

  return (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null) {
      next(createError('Request body must be a JSON object', 400, 'INVALID_REQUEST'));
      return;
    }

    const values: Record<string, unknown> = Object.fromEntries(Object.entries(body));
    const { wallet, signature, timestamp } = values;

    if (!isValidWalletAddress(wallet)) {
      next(createError('Invalid wallet address', 400, 'INVALID_ADDRESS'));
      return;
    }
    if (typeof signature !== 'string' || typeof timestamp !== 'number' || !Number.isInteger(timestamp)) {
      next(createError('signature and timestamp are required', 401, 'UNSIGNED_REQUEST'));
      return;
    }

    const nowSeconds = Math.floor(now() / 1000);
    const ageSeconds = Math.abs(nowSeconds - timestamp);
    if (ageSeconds > maxAgeSeconds) {
      next(createError('Signature timestamp outside the accepted window', 401, 'STALE_SIGNATURE'));
      return;
    }

    const params: Record<string, SignedValue> = {};
    for (const field of fields) {
      const value = toSignedValue(values[field]);
      if (value === null) {
        next(createError(`Missing or invalid field: ${field}`, 400, 'INVALID_REQUEST'));
        return;
      }
      params[field] = value;
    }

    const message = buildSignedMessage(action, params, timestamp);
    if (!verifyWalletSignature(message, signature, wallet)) {
      next(createError('Invalid signature', 401, 'INVALID_SIGNATURE'));
      return;
    }

    if (!replays.accept(`${wallet}\n${message}`, timestamp + maxAgeSeconds, nowSeconds)) {
      next(createError('Signed request already used', 401, 'REPLAYED_SIGNATURE'));
      return;
    }

    res.locals.caller = wallet;
    next();
  };
}
