import { PublicKey } from '@solana/web3.js';

const BASE58 = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

/**
 * Validate Solana wallet address: base58, decodes to a 32-byte key
 */
export function isValidWalletAddress(address: unknown): address is string {
  if (typeof address !== 'string' || !BASE58.test(address)) return false;
  try {
    new PublicKey(address);
    return true;
  } catch {
    return false;
  }
}
