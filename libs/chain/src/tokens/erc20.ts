import { Address, ZERO_ADDRESS } from '@Bazaar/type';

import { Chain } from '../chain';
import { ChainError, ChainErrorCode } from '../chain.error';
import { Contract } from '../contract';
import { Erc20TransferResult, IErc20 } from '../interfaces';

/**
 * How a token reports transfer outcomes. Real tokens disagree: most
 * return true and revert on failure, some return nothing, and some
 * return false without reverting.
 */
export enum Erc20ReturnMode {
  Standard = 'standard',
  NoReturn = 'no-return',
  FalseOnFailure = 'false-on-failure',
}

type Erc20State = {
  totalSupply: bigint;
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
};

function allowanceKey(owner: Address, spender: Address) {
  return `${owner}:${spender}`;
}

export class Erc20 extends Contract<Erc20State> implements IErc20 {
  protected readonly state: Erc20State = {
    totalSupply: 0n,
    balances: new Map(),
    allowances: new Map(),
  };

  constructor(
    chain: Chain,
    readonly name: string,
    readonly symbol: string,
    readonly returnMode: Erc20ReturnMode = Erc20ReturnMode.Standard,
  ) {
    super(chain, `erc20:${symbol}`);
  }

  totalSupply() {
    return this.state.totalSupply;
  }

  balanceOf(owner: Address): bigint {
    return this.state.balances.get(owner) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  approve(spender: Address, amount: bigint): Erc20TransferResult {
    const owner = this.msg.sender;
    this.state.allowances.set(allowanceKey(owner, spender), amount);
    this.emit({ name: 'Approval', args: { owner, spender, value: amount } });
    return this.success();
  }

  transfer(to: Address, amount: bigint): Erc20TransferResult {
    return this.attempt(() => this.move(this.msg.sender, to, amount));
  }

  transferFrom(
    from: Address,
    to: Address,
    amount: bigint,
  ): Erc20TransferResult {
    const spender = this.msg.sender;
    return this.attempt(() => {
      const allowed = this.allowance(from, spender);
      if (allowed < amount) {
        throw new ChainError(
          ChainErrorCode.InsufficientAllowance,
          `${spender} may spend ${allowed} of ${from}, needs ${amount}`,
        );
      }
      this.move(from, to, amount);
      this.state.allowances.set(allowanceKey(from, spender), allowed - amount);
    });
  }

  mint(to: Address, amount: bigint) {
    if (to === ZERO_ADDRESS) {
      throw new ChainError(ChainErrorCode.ZeroAddress);
    }
    this.state.totalSupply += amount;
    this.state.balances.set(to, this.balanceOf(to) + amount);
  }

  private move(from: Address, to: Address, amount: bigint) {
    if (amount < 0n) {
      throw new ChainError(ChainErrorCode.InvalidAmount);
    }
    if (to === ZERO_ADDRESS) {
      throw new ChainError(ChainErrorCode.ZeroAddress);
    }
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new ChainError(
        ChainErrorCode.InsufficientBalance,
        `${from} holds ${balance} ${this.symbol}, needs ${amount}`,
      );
    }
    this.state.balances.set(from, balance - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.emit({ name: 'Transfer', args: { from, to, value: amount } });
  }

  private attempt(body: () => void): Erc20TransferResult {
    if (this.returnMode !== Erc20ReturnMode.FalseOnFailure) {
      body();
      return this.success();
    }
    // State is only touched once every check has passed, so a refused
    // transfer leaves nothing to undo.
    try {
      body();
    } catch (err) {
      if (err instanceof ChainError) {
        return false;
      }
      throw err;
    }
    return true;
  }

  private success(): Erc20TransferResult {
    return this.returnMode === Erc20ReturnMode.NoReturn ? undefined : true;
  }
}
