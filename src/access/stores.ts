// src/access/stores.ts
// Governance state persistence

import { Pool, QueryResult, QueryResultRow } from 'pg';
import { DELEGABLE_ROLES, GovernanceState, GovernanceStore, emptyGrants, isRole } from './types';

function cloneState(state: GovernanceState): GovernanceState {
  const grants = emptyGrants();
  for (const role of DELEGABLE_ROLES) {
    grants[role] = [...state.grants[role]];
  }
  return { ...state, grants };
}

export class InMemoryGovernanceStore implements GovernanceStore {
  private state: GovernanceState;

  constructor(authority: string) {
    this.state = { authority, pendingAuthority: null, paused: false, grants: emptyGrants() };
  }

  async load(): Promise<GovernanceState> {
    return cloneState(this.state);
  }

  async save(state: GovernanceState): Promise<void> {
    this.state = cloneState(state);
  }
}

/**
 * The slice of pg the governance store runs on
 */
export interface SqlExecutor {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlDatabase extends SqlExecutor {
  /** Run `work` between BEGIN and COMMIT on one connection; ROLLBACK if it throws */
  transaction(work: (tx: SqlExecutor) => Promise<void>): Promise<void>;
}

export function pgDatabase(pool: Pool): SqlDatabase {
  return {
    query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
      return pool.query<R>(text, values);
    },

    async transaction(work: (tx: SqlExecutor) => Promise<void>): Promise<void> {
      const client = await pool.connect();

      try {
        await client.query('BEGIN');
        await work({
          query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
            return client.query<R>(text, values);
          },
        });
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          console.error('[Authority] Rollback failed:', rollbackError);
        });
        throw error;
      } finally {
        client.release();
      }
    },
  };
}

/**
 * Reads and writes claim_governance (one row) and claim_role_grants.
 * Until the first save there is no row and `initialAuthority` holds.
 */
export class PgGovernanceStore implements GovernanceStore {
  constructor(private db: SqlDatabase, private initialAuthority: string) {}

  async load(): Promise<GovernanceState> {
    const { rows } = await this.db.query<{
      authority: string;
      pending_authority: string | null;
      paused: boolean;
    }>(`SELECT authority, pending_authority, paused FROM claim_governance WHERE id = 1`);

    const grantRows = await this.db.query<{ role: string; wallet: string }>(
      `SELECT role, wallet FROM claim_role_grants ORDER BY role, wallet`
    );

    const grants = emptyGrants();
    for (const { role, wallet } of grantRows.rows) {
      if (isRole(role)) grants[role].push(wallet);
    }

    const row = rows[0];
    return {
      authority: row?.authority ?? this.initialAuthority,
      pendingAuthority: row?.pending_authority ?? null,
      paused: row?.paused ?? false,
      grants,
    };
  }

  async save(state: GovernanceState): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.query(
        `
        INSERT INTO claim_governance (id, authority, pending_authority, paused, updated_at)
        VALUES (1, $1, $2, $3, NOW())
        ON CONFLICT (id) DO UPDATE
        SET authority = EXCLUDED.authority,
            pending_authority = EXCLUDED.pending_authority,
            paused = EXCLUDED.paused,
            updated_at = NOW()
        `,
        [state.authority, state.pendingAuthority, state.paused]
      );
      await tx.query('DELETE FROM claim_role_grants');
      for (const role of DELEGABLE_ROLES) {
        for (const wallet of state.grants[role]) {
          await tx.query(`INSERT INTO claim_role_grants (role, wallet) VALUES ($1, $2)`, [role, wallet]);
        }
      }
    });
  }
}
