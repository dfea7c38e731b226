// src/testing/fixtures.ts
// Shared helpers for the test suites

import { PublicKey } from '@solana/web3.js';
import nacl from 'tweetnacl';
import bs58 from 'bs58';
import { AuthorityRegistry } from '../access/authority';
import { InMemoryGovernanceStore } from '../access/stores';
import { AdminService } from '../claims/admin';
import { ClaimLedger } from '../claims/ledger';
import { InMemoryClaimStore } from '../claims/memory-store';
import {
  AssetSweeper,
  TokenLedger,
  TransferInstruction,
  TransferOutcomeUnknownError,
} from '../claims/types';
import { MerkleTree, constructLeaf } from '../merkle/tree';
import { Entitlement } from '../merkle/types';

export const CLAIM_MINT = new PublicKey(Buffer.alloc(32, 7)).toBase58();
export const FOREIGN_MINT = new PublicKey(Buffer.alloc(32, 9)).toBase58();

export interface TestWallet {
  wallet: string;
  secretKey: Uint8Array;
}

export function makeWallet(): TestWallet {
  const keyPair = nacl.sign.keyPair();
  return {
    wallet: new PublicKey(keyPair.publicKey).toBase58(),
    secretKey: keyPair.secretKey,
  };
}

export function signMessage(signer: TestWallet, message: string): string {
  return bs58.encode(nacl.sign.detached(new TextEncoder().encode(message), signer.secretKey));
}

export function buildTree(entries: Entitlement[]): MerkleTree {
  return new MerkleTree(entries.map((e) => constructLeaf(e.wallet, e.amount)));
}

export type TransferMode = 'ok' | 'reject' | 'throw' | 'unknown';

/**
 * Token ledger stand-in that records what it was asked to move
 */
export class FakeTokenLedger implements TokenLedger, AssetSweeper {
  transfers: TransferInstruction[] = [];
  sweeps: Array<{ mint: string; to: string; amount: bigint }> = [];
  mode: TransferMode = 'ok';
  delayMs = 0;

  async transfer(to: string, amount: bigint): Promise<boolean> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.mode === 'throw') throw new Error('rpc unavailable');
    if (this.mode === 'reject') return false;
    if (this.mode === 'unknown') throw new TransferOutcomeUnknownError('test-signature');

    this.transfers.push({ recipient: to, amount });
    return true;
  }

  async sweep(mint: string, to: string, amount: bigint): Promise<boolean> {
    if (this.mode === 'throw') throw new Error('rpc unavailable');
    if (this.mode === 'reject') return false;
    if (this.mode === 'unknown') throw new TransferOutcomeUnknownError('test-signature');

    this.sweeps.push({ mint, to, amount });
    return true;
  }
}

export interface TestContext {
  store: InMemoryClaimStore;
  tokens: FakeTokenLedger;
  authority: AuthorityRegistry;
  ledger: ClaimLedger;
  admin: AdminService;
  authorityWallet: TestWallet;
}

export function createTestContext(root?: Buffer, maxProofDepth?: number): TestContext {
  const authorityWallet = makeWallet();
  const store = new InMemoryClaimStore(root);
  const tokens = new FakeTokenLedger();
  const authority = new AuthorityRegistry(new InMemoryGovernanceStore(authorityWallet.wallet));
  const ledger = new ClaimLedger({ store, tokens, access: authority, maxProofDepth });
  const admin = new AdminService({ ledger, authority, sweeper: tokens, claimMint: CLAIM_MINT });

  return { store, tokens, authority, ledger, admin, authorityWallet };
}
