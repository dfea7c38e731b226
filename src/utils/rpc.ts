// src/utils/rpc.ts
// RPC connection utility with automatic failover support

import { Commitment, Connection } from '@solana/web3.js';

export interface RpcConfig {
  primaryUrl: string;
  backupUrl?: string;
  commitment?: 'processed' | 'confirmed' | 'finalized';
  maxRetries?: number;
  retryDelayMs?: number;
  /** How long to stay on the backup before retrying the primary */
  recoveryIntervalMs?: number;
}

export type ConnectionFactory = (url: string, commitment: Commitment) => Connection;

export interface RpcState {
  primaryHealthy: boolean;
  lastFailoverTime: number | null;
  failoverCount: number;
}

// Time to wait before trying primary again after failover (5 minutes)
const PRIMARY_RECOVERY_INTERVAL_MS = 5 * 60 * 1000;

const FAILOVER_PATTERNS = [
  'fetch failed',
  'failed to fetch',
  'network error',
  'econnrefused',
  'econnreset',
  'etimedout',
  'socket hang up',
  'getaddrinfo',
  'enotfound',
  'connection refused',
  'connection reset',
  'request timeout',
  '429',
  'too many requests',
  '502',
  '503',
  '504',
  'internal server error',
];

/**
 * Get RPC configuration from environment variables
 */
export function getRpcConfigFromEnv(): RpcConfig {
  const primaryUrl = process.env.SOLANA_RPC_URL;
  const backupUrl = process.env.SOLANA_RPC_URL_BACKUP;

  if (!primaryUrl) {
    throw new Error('Missing SOLANA_RPC_URL environment variable');
  }

  return {
    primaryUrl,
    backupUrl: backupUrl || undefined,
    commitment: 'confirmed',
    maxRetries: 3,
    retryDelayMs: 1000,
  };
}

/**
 * Network and endpoint-health errors warrant switching endpoints;
 * application errors (bad instruction, insufficient funds) do not.
 */
export function isFailoverableError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return FAILOVER_PATTERNS.some((pattern) => message.includes(pattern));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Connection wrapper that retries operations and fails over to a backup RPC
 */
export class FailoverConnection {
  private state: RpcState = {
    primaryHealthy: true,
    lastFailoverTime: null,
    failoverCount: 0,
  };
  private cached: { url: string; connection: Connection } | null = null;

  constructor(
    private config: RpcConfig,
    private createConnection: ConnectionFactory = (url, commitment) => new Connection(url, commitment)
  ) {}

  /**
   * Get the currently active RPC URL based on health state
   */
  getCurrentUrl(): string {
    if (this.state.primaryHealthy || !this.config.backupUrl) {
      return this.config.primaryUrl;
    }

    const recoveryMs = this.config.recoveryIntervalMs ?? PRIMARY_RECOVERY_INTERVAL_MS;
    if (
      this.state.lastFailoverTime !== null &&
      Date.now() - this.state.lastFailoverTime > recoveryMs
    ) {
      console.log('[RPC] Attempting to recover primary RPC connection...');
      this.state.primaryHealthy = true;
      return this.config.primaryUrl;
    }

    return this.config.backupUrl;
  }

  get connection(): Connection {
    const url = this.getCurrentUrl();
    if (!this.cached || this.cached.url !== url) {
      this.cached = { url, connection: this.createConnection(url, this.config.commitment ?? 'confirmed') };
    }
    return this.cached.connection;
  }

  hasBackup(): boolean {
    return !!this.config.backupUrl;
  }

  getState(): Readonly<RpcState> {
    return { ...this.state };
  }

  /**
   * Execute an RPC operation with retries and failover.
   * A failoverable error on the primary switches to the backup and
   * restarts the attempt count there. Errors rejected by `shouldRetry`
   * are thrown at once.
   */
  async execute<T>(
    operation: (connection: Connection) => Promise<T>,
    operationName = 'RPC operation',
    shouldRetry: (error: unknown) => boolean = () => true
  ): Promise<T> {
    const maxRetries = this.config.maxRetries ?? 3;
    const retryDelayMs = this.config.retryDelayMs ?? 1000;

    let lastError: unknown = null;
    let attempts = 0;

    while (attempts < maxRetries) {
      attempts++;

      try {
        return await operation(this.connection);
      } catch (error) {
        if (!shouldRetry(error)) {
          throw error;
        }

        lastError = error;
        const message = error instanceof Error ? error.message : String(error);

        if (isFailoverableError(error)) {
          console.log(`[RPC] ${operationName} failed (attempt ${attempts}/${maxRetries}): ${message}`);

          if (this.config.backupUrl && this.state.primaryHealthy) {
            this.markPrimaryFailed();
            attempts = 0;
            continue;
          }
        }

        if (attempts < maxRetries) {
          await sleep(retryDelayMs * attempts);
        }
      }
    }

    throw lastError ?? new Error(`${operationName} failed after ${maxRetries} attempts`);
  }

  private markPrimaryFailed(): void {
    this.state.primaryHealthy = false;
    this.state.lastFailoverTime = Date.now();
    this.state.failoverCount++;
    console.log(`[RPC] Primary RPC failed, switching to backup (failover #${this.state.failoverCount})`);
  }
}
