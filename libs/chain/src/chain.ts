import { EventEmitter } from 'events';

import { getAddress, isAddress } from '@ethersproject/address';
import { hexDataSlice } from '@ethersproject/bytes';
import { keccak256 } from '@ethersproject/keccak256';
import { toUtf8Bytes } from '@ethersproject/strings';

import { Address, ChainEvent } from '@Bazaar/type';

import { ChainError, ChainErrorCode } from './chain.error';

export type CallFrame = {
  sender: Address;
  target: Address;
  value: bigint;
};

export type ChainLog = {
  blockNumber: number;
  logIndex: number;
  address: Address;
  event: ChainEvent;
};

export type LogListener = (log: ChainLog) => void;

/** Anything living at an address whose state follows call reverts. */
export interface StatefulAccount {
  readonly address: Address;
  checkpoint(): () => void;
  receive(): void;
}

const LOG_EVENT = 'log';

export function labelAddress(label: string): Address {
  return getAddress(hexDataSlice(keccak256(toUtf8Bytes(label)), 12));
}

/**
 * In-process ledger. Every call runs inside a frame; a throwing call
 * rolls back native balances, contract state and pending logs to the
 * point the call started. Logs reach listeners once the outermost call
 * returns.
 */
export class Chain {
  private readonly balances = new Map<Address, bigint>();
  private readonly accounts = new Map<Address, StatefulAccount>();
  private readonly frames: CallFrame[] = [];
  private readonly emitter = new EventEmitter();
  private pending: ChainLog[] = [];
  private accountNonce = 0;
  private logIndex = 0;

  readonly logs: ChainLog[] = [];
  blockNumber = 0;

  get msg(): CallFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new ChainError(ChainErrorCode.NoActiveCall);
    }
    return frame;
  }

  get depth() {
    return this.frames.length;
  }

  createAccount(label?: string): Address {
    return labelAddress(label ?? `account:${this.accountNonce++}`);
  }

  resolveAccount(nameOrAddress: string): Address {
    return isAddress(nameOrAddress)
      ? getAddress(nameOrAddress)
      : this.createAccount(nameOrAddress);
  }

  register(account: StatefulAccount) {
    this.accounts.set(account.address, account);
  }

  accountAt(address: Address): StatefulAccount | undefined {
    return this.accounts.get(address);
  }

  isContract(address: Address) {
    return this.accounts.has(address);
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }

  setBalance(address: Address, amount: bigint) {
    if (amount < 0n) {
      throw new ChainError(ChainErrorCode.InvalidAmount);
    }
    this.balances.set(address, amount);
  }

  call<T>(sender: Address, target: Address, value: bigint, body: () => T): T {
    const outermost = this.frames.length === 0;
    if (outermost) {
      this.blockNumber++;
    }

    const rollback = this.checkpoint();
    this.frames.push({ sender, target, value });
    try {
      this.moveNative(sender, target, value);
      return body();
    } catch (err) {
      rollback();
      throw err;
    } finally {
      this.frames.pop();
      if (outermost) {
        this.flush();
      }
    }
  }

  /** Sends base currency from the executing account. */
  sendValue(to: Address, amount: bigint) {
    const from = this.msg.target;
    const recipient = this.accounts.get(to);
    this.call(from, to, amount, () => recipient?.receive());
  }

  emitLog(event: ChainEvent) {
    this.pending.push({
      blockNumber: this.blockNumber,
      logIndex: this.logIndex++,
      address: this.msg.target,
      event,
    });
  }

  onLog(listener: LogListener): () => void {
    this.emitter.on(LOG_EVENT, listener);
    return () => {
      this.emitter.off(LOG_EVENT, listener);
    };
  }

  private moveNative(from: Address, to: Address, amount: bigint) {
    if (amount < 0n) {
      throw new ChainError(ChainErrorCode.InvalidAmount);
    }
    if (amount === 0n) {
      return;
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new ChainError(
        ChainErrorCode.InsufficientFunds,
        `${from} holds ${available}, needs ${amount}`,
      );
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  private checkpoint(): () => void {
    const balances = new Map(this.balances);
    const pendingLength = this.pending.length;
    const restores = [...this.accounts.values()].map((account) =>
      account.checkpoint(),
    );

    return () => {
      this.balances.clear();
      for (const [address, amount] of balances) {
        this.balances.set(address, amount);
      }
      this.pending = this.pending.slice(0, pendingLength);
      for (const restore of restores) {
        restore();
      }
    };
  }

  private flush() {
    const committed = this.pending;
    this.pending = [];
    for (const log of committed) {
      this.logs.push(log);
      this.emitter.emit(LOG_EVENT, log);
    }
  }
}
