// src/claims/admin.ts
// Administrative surface: permission check, then delegate

import { AuthorityRegistry } from '../access/authority';
import { GovernanceState, Role } from '../access/types';
import { isValidWalletAddress } from '../utils/wallet';
import { ClaimLedger } from './ledger';
import { AssetSweeper, ClaimError, Result, fail, ok } from './types';

export interface AdminServiceConfig {
  ledger: ClaimLedger;
  authority: AuthorityRegistry;
  sweeper: AssetSweeper;
  claimMint: string;
}

export interface AdminStatus extends GovernanceState {
  root: string;
  claimMint: string;
}

export class AdminService {
  constructor(private config: AdminServiceConfig) {}

  async setRoot(caller: string, root: Buffer): Promise<Result<void>> {
    return this.config.ledger.rotateRoot(caller, root);
  }

  async pause(caller: string): Promise<Result<void>> {
    return this.config.authority.pause(caller);
  }

  async unpause(caller: string): Promise<Result<void>> {
    return this.config.authority.unpause(caller);
  }

  /**
   * Return tokens of another mint that ended up in the distributor's wallet.
   * The claim token itself is never sweepable.
   */
  async sweepForeignAsset(
    caller: string,
    mint: string,
    to: string,
    amount: bigint
  ): Promise<Result<void>> {
    if (!(await this.config.authority.isAuthorityFor('sweep', caller))) {
      return fail(new ClaimError('Unauthorized', `${caller} may not sweep`));
    }
    if (!isValidWalletAddress(mint) || !isValidWalletAddress(to)) {
      return fail(new ClaimError('InvalidRequest', 'Mint and destination must be valid addresses'));
    }
    if (mint === this.config.claimMint) {
      return fail(new ClaimError('InvalidRequest', 'The claim token cannot be swept'));
    }
    if (amount <= 0n) {
      return fail(new ClaimError('InvalidRequest', 'Sweep amount must be positive'));
    }

    let swept: boolean;
    try {
      swept = await this.config.sweeper.sweep(mint, to, amount);
    } catch (error) {
      return fail(new ClaimError('TransferFailed', `Sweep of ${mint} failed`, { cause: error }));
    }
    if (!swept) {
      return fail(new ClaimError('TransferFailed', `Sweep of ${mint} was rejected`));
    }

    console.log(`[Admin] Swept ${amount} of ${mint} to ${to} (by ${caller})`);
    return ok(undefined);
  }

  async nominateAuthority(caller: string, nominee: string): Promise<Result<void>> {
    return this.config.authority.nominateAuthority(caller, nominee);
  }

  async acceptAuthority(caller: string): Promise<Result<void>> {
    return this.config.authority.acceptAuthority(caller);
  }

  async cancelNomination(caller: string): Promise<Result<void>> {
    return this.config.authority.cancelNomination(caller);
  }

  async grantRole(caller: string, role: Role, grantee: string): Promise<Result<void>> {
    return this.config.authority.grantRole(caller, role, grantee);
  }

  async revokeRole(caller: string, role: Role, grantee: string): Promise<Result<void>> {
    return this.config.authority.revokeRole(caller, role, grantee);
  }

  async status(): Promise<AdminStatus> {
    const [state, root] = await Promise.all([
      this.config.authority.getState(),
      this.config.ledger.currentRoot(),
    ]);
    return { ...state, root: root.toString('hex'), claimMint: this.config.claimMint };
  }
}
