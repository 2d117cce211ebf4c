import { getCreateAddress, id } from 'ethers';
import { Journal } from './JournaledMap';
import { normalizeAddress } from './address';

export interface BaseEvent {
  txHash: string;
  timestamp: number;
  logIndex: number;
}

type Delivery = (meta: BaseEvent) => void;

export interface NetworkOptions {
  chainId?: number;
  /** Initial block timestamp in seconds */
  timestamp?: number;
  /** Receives errors thrown by log subscribers; the transaction has already committed. */
  onLogError?: (error: unknown) => void;
}

/**
 * In-process stand-in for the chain the engine would otherwise run on.
 *
 * Provides deterministic contract addresses, a block clock, and
 * all-or-nothing transactions: every journaled write made inside
 * `transaction()` is undone when the callback throws, and logs are delivered
 * only once the outermost transaction commits. A subscriber that throws does
 * not fail the committed transaction or stop delivery of the remaining logs.
 */
export class Network implements Journal {
  readonly chainId: number;
  private time: number;
  private readonly nonces = new Map<string, number>();

  private depth = 0;
  private undoLog: (() => void)[] = [];
  private pendingLogs: Delivery[] = [];
  private txCount = 0;
  private readonly onLogError: (error: unknown) => void;

  constructor(options: NetworkOptions = {}) {
    this.chainId = options.chainId ?? 31337;
    this.time = options.timestamp ?? Math.floor(Date.now() / 1000);
    this.onLogError = options.onLogError ?? ((error) => console.error('Log subscriber failed:', error));
  }

  // ***** CLOCK *****

  get timestamp(): number {
    return this.time;
  }

  increaseTime(seconds: number): void {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error(`Invalid time increase: ${seconds}`);
    }
    this.time += seconds;
  }

  // ***** ACCOUNTS *****

  /** Address of the next contract deployed by `deployer`. */
  deploy(deployer: string): string {
    const from = normalizeAddress(deployer);
    const nonce = this.nonces.get(from) ?? 0;
    this.nonces.set(from, nonce + 1);
    return getCreateAddress({ from, nonce });
  }

  /** Deterministic externally owned accounts, like a dev node's unlocked signers. */
  getSigners(count: number): string[] {
    return Array.from({ length: count }, (_, index) => this.account(`signer-${index}`));
  }

  account(label: string): string {
    return normalizeAddress(id(`${this.chainId}:${label}`).slice(0, 42));
  }

  // ***** TRANSACTIONS *****

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  record(undo: () => void): void {
    if (this.depth > 0) this.undoLog.push(undo);
  }

  /** Buffer a log until the surrounding transaction commits. */
  log(deliver: Delivery): void {
    if (this.depth > 0) {
      this.pendingLogs.push(deliver);
    } else {
      this.deliver([deliver]);
    }
  }

  transaction<T>(fn: () => T): T {
    const undoCheckpoint = this.undoLog.length;
    const logCheckpoint = this.pendingLogs.length;
    this.depth++;

    let result: T;
    try {
      result = fn();
    } catch (error) {
      const undo = this.undoLog.splice(undoCheckpoint);
      for (let i = undo.length - 1; i >= 0; i--) undo[i]();
      this.pendingLogs.splice(logCheckpoint);
      this.depth--;
      throw error;
    }

    this.depth--;
    if (this.depth === 0) {
      this.undoLog = [];
      const logs = this.pendingLogs;
      this.pendingLogs = [];
      this.deliver(logs);
    }
    return result;
  }

  private deliver(logs: Delivery[]): void {
    const txHash = id(`${this.chainId}:tx:${this.txCount++}`);
    logs.forEach((deliver, logIndex) => {
      try {
        deliver({ txHash, timestamp: this.time, logIndex });
      } catch (error) {
        this.onLogError(error);
      }
    });
  }
}
