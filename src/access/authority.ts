// src/access/authority.ts
// Single capability check for every privileged operation, plus pause state
// and two-phase authority handoff

import { AccessControl, AdminAction, ClaimError, Result, fail, ok } from '../claims/types';
import { KeyedMutex } from '../utils/lock';
import { isValidWalletAddress } from '../utils/wallet';
import { GovernanceState, GovernanceStore, Role, isDelegable } from './types';

const GOVERNANCE_LOCK = 'governance';

function permits(state: GovernanceState, action: AdminAction, caller: string): boolean {
  if (state.authority === caller) return true;
  return isDelegable(action) && state.grants[action].includes(caller);
}

export class AuthorityRegistry implements AccessControl {
  private lock = new KeyedMutex();

  constructor(private store: GovernanceStore) {}

  async isAcceptingClaims(): Promise<boolean> {
    const state = await this.store.load();
    return !state.paused;
  }

  async isAuthorityFor(action: AdminAction, caller: string): Promise<boolean> {
    return permits(await this.store.load(), action, caller);
  }

  async getState(): Promise<GovernanceState> {
    return this.store.load();
  }

  async pause(caller: string): Promise<Result<void>> {
    return this.mutate(caller, 'pause', (state) => {
      state.paused = true;
    });
  }

  async unpause(caller: string): Promise<Result<void>> {
    return this.mutate(caller, 'unpause', (state) => {
      state.paused = false;
    });
  }

  /**
   * Step one of the handoff: record a nominee. Authority stays put until
   * the nominee accepts.
   */
  async nominateAuthority(caller: string, nominee: string): Promise<Result<void>> {
    if (!isValidWalletAddress(nominee)) {
      return fail(new ClaimError('InvalidRequest', 'Nominee is not a valid wallet address'));
    }
    return this.mutate(caller, 'transferAuthority', (state) => {
      state.pendingAuthority = nominee;
    });
  }

  /**
   * Step two: only the pending nominee can complete the handoff
   */
  async acceptAuthority(caller: string): Promise<Result<void>> {
    return this.lock.runExclusive(GOVERNANCE_LOCK, async () => {
      const state = await this.store.load();

      if (state.pendingAuthority === null || state.pendingAuthority !== caller) {
        return fail(new ClaimError('Unauthorized', `${caller} is not the pending authority`));
      }

      const previous = state.authority;
      state.authority = caller;
      state.pendingAuthority = null;
      await this.store.save(state);

      console.log(`[Authority] Authority transferred from ${previous} to ${caller}`);
      return ok(undefined);
    });
  }

  async cancelNomination(caller: string): Promise<Result<void>> {
    return this.mutate(caller, 'transferAuthority', (state) => {
      state.pendingAuthority = null;
    });
  }

  async grantRole(caller: string, role: Role, grantee: string): Promise<Result<void>> {
    if (!isValidWalletAddress(grantee)) {
      return fail(new ClaimError('InvalidRequest', 'Grantee is not a valid wallet address'));
    }
    return this.mutate(caller, 'grantRole', (state) => {
      if (!state.grants[role].includes(grantee)) {
        state.grants[role].push(grantee);
      }
    });
  }

  async revokeRole(caller: string, role: Role, grantee: string): Promise<Result<void>> {
    return this.mutate(caller, 'revokeRole', (state) => {
      state.grants[role] = state.grants[role].filter((w) => w !== grantee);
    });
  }

  private async mutate(
    caller: string,
    action: AdminAction,
    apply: (state: GovernanceState) => void
  ): Promise<Result<void>> {
    return this.lock.runExclusive(GOVERNANCE_LOCK, async () => {
      const state = await this.store.load();

      if (!permits(state, action, caller)) {
        return fail(new ClaimError('Unauthorized', `${caller} may not ${action}`));
      }

      apply(state);
      await this.store.save(state);

      console.log(`[Authority] ${action} by ${caller}`);
      return ok(undefined);
    });
  }
}
