// src/access/types.ts

import { AdminAction } from '../claims/types';

/**
 * Actions the authority may delegate to other wallets
 */
export const DELEGABLE_ROLES = ['setRoot', 'pause', 'unpause', 'sweep'] as const;

export type Role = (typeof DELEGABLE_ROLES)[number];

export function isRole(value: unknown): value is Role {
  return DELEGABLE_ROLES.some((role) => role === value);
}

export function isDelegable(action: AdminAction): action is Role {
  return isRole(action);
}

export interface GovernanceState {
  authority: string;
  pendingAuthority: string | null;
  paused: boolean;
  grants: Record<Role, string[]>;
}

export function emptyGrants(): Record<Role, string[]> {
  return { setRoot: [], pause: [], unpause: [], sweep: [] };
}

/**
 * Persistence for authority, pause flag and role grants
 */
export interface GovernanceStore {
  load(): Promise<GovernanceState>;
  save(state: GovernanceState): Promise<void>;
}
