// src/claims/memory-store.ts
// In-process claim store for tests and single-process deployments

import { KeyedMutex } from '../utils/lock';
import { ZERO_ROOT } from '../merkle/types';
import { ClaimStore, RedemptionTransaction } from './types';

interface RedemptionEntry {
  amount: bigint;
  root: Buffer;
  claimedAt: Date;
}

export class InMemoryClaimStore implements ClaimStore {
  private root: Buffer;
  private redemptions = new Map<string, RedemptionEntry>();
  private locks = new KeyedMutex();

  constructor(initialRoot: Buffer = ZERO_ROOT) {
    this.root = Buffer.from(initialRoot);
  }

  async getRoot(): Promise<Buffer> {
    return Buffer.from(this.root);
  }

  async setRoot(root: Buffer): Promise<Buffer> {
    // Single reference swap; readers see the old or the new root, never a mix
    const previous = this.root;
    this.root = Buffer.from(root);
    return Buffer.from(previous);
  }

  async isClaimed(recipient: string): Promise<boolean> {
    return this.redemptions.has(recipient);
  }

  getRedemption(recipient: string): Readonly<RedemptionEntry> | undefined {
    return this.redemptions.get(recipient);
  }

  async withRecipient<T>(
    recipient: string,
    work: (tx: RedemptionTransaction) => Promise<T>
  ): Promise<T> {
    return this.locks.runExclusive(recipient, async () => {
      const root = this.root;
      const claimedBefore = this.redemptions.has(recipient);

      const tx: RedemptionTransaction = {
        root: Buffer.from(root),
        isClaimed: async () => this.redemptions.has(recipient),
        markClaimed: async (amount) => {
          if (this.redemptions.has(recipient)) {
            throw new Error(`Redemption already recorded for ${recipient}`);
          }
          this.redemptions.set(recipient, { amount, root, claimedAt: new Date() });
        },
      };

      try {
        return await work(tx);
      } catch (error) {
        if (!claimedBefore) {
          this.redemptions.delete(recipient);
        }
        throw error;
      }
    });
  }
}
