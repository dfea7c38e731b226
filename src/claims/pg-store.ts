// src/claims/pg-store.ts
// PostgreSQL-backed claim store (schema in sql/schema.sql)

import { Pool, PoolClient } from 'pg';
import { ZERO_ROOT } from '../merkle/types';
import { ClaimStore, RedemptionTransaction } from './types';

export class PgClaimStore implements ClaimStore {
  constructor(private pool: Pool) {}

  async getRoot(): Promise<Buffer> {
    const { rows } = await this.pool.query<{ merkle_root: Buffer }>(
      `SELECT merkle_root FROM claim_root WHERE id = 1`
    );
    return rows[0]?.merkle_root ?? Buffer.from(ZERO_ROOT);
  }

  /**
   * Swap the single root row and return the previous root.
   * The FOR UPDATE read waits for claims holding the row FOR SHARE
   * and for any concurrent rotation.
   */
  async setRoot(root: Buffer): Promise<Buffer> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const { rows } = await client.query<{ merkle_root: Buffer }>(
        `SELECT merkle_root FROM claim_root WHERE id = 1 FOR UPDATE`
      );
      const previous = rows[0]?.merkle_root ?? Buffer.from(ZERO_ROOT);

      await client.query(
        `
        INSERT INTO claim_root (id, merkle_root, updated_at)
        VALUES (1, $1, NOW())
        ON CONFLICT (id) DO UPDATE
        SET merkle_root = EXCLUDED.merkle_root, updated_at = NOW()
        `,
        [root]
      );

      await client.query('COMMIT');
      return previous;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        console.error('[ClaimStore] Rollback failed:', rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async isClaimed(recipient: string): Promise<boolean> {
    const { rows } = await this.pool.query<{ claimed: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM claim_redemptions WHERE recipient = $1) AS claimed`,
      [recipient]
    );
    return rows[0]?.claimed ?? false;
  }

  /**
   * One transaction per claim:
   * - advisory lock serialises sections for the same recipient
   * - root row read FOR SHARE so rotation cannot interleave
   * - ROLLBACK on any failure undoes the redemption insert
   */
  async withRecipient<T>(
    recipient: string,
    work: (tx: RedemptionTransaction) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [recipient]);

      const { rows } = await client.query<{ merkle_root: Buffer }>(
        `SELECT merkle_root FROM claim_root WHERE id = 1 FOR SHARE`
      );
      const root = rows[0]?.merkle_root ?? Buffer.from(ZERO_ROOT);

      const result = await work(this.transaction(client, recipient, root));

      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        console.error('[ClaimStore] Rollback failed:', rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  private transaction(client: PoolClient, recipient: string, root: Buffer): RedemptionTransaction {
    return {
      root,
      isClaimed: async () => {
        const { rowCount } = await client.query(
          `SELECT 1 FROM claim_redemptions WHERE recipient = $1`,
          [recipient]
        );
        return (rowCount ?? 0) > 0;
      },
      markClaimed: async (amount) => {
        await client.query(
          `
          INSERT INTO claim_redemptions (recipient, amount, merkle_root, claimed_at)
          VALUES ($1, $2, $3, NOW())
          `,
          [recipient, amount.toString(), root]
        );
      },
    };
  }
}
