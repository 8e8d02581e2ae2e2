import { Address, ChainEvent, INTERFACE_IDS } from '@Bazaar/type';

import { CallOverrides, bindCaller } from './caller';
import { CallFrame, Chain, StatefulAccount, labelAddress } from './chain';
import { ChainError, ChainErrorCode } from './chain.error';

let deployNonce = 0;

/**
 * Base for everything deployed on a {@link Chain}. Subclasses keep all
 * mutable data inside `state`, which must stay structured-cloneable so a
 * reverted call can restore it.
 */
export abstract class Contract<S extends object> implements StatefulAccount {
  readonly address: Address;
  protected abstract readonly state: S;

  constructor(readonly chain: Chain, label: string) {
    this.address = labelAddress(`contract:${label}:${deployNonce++}`);
    chain.register(this);
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      Object.assign(this.state, saved);
    };
  }

  receive(): void {
    throw new ChainError(
      ChainErrorCode.NonPayable,
      `${this.address} does not accept base currency`,
    );
  }

  supportsInterface(interfaceId: string): boolean {
    return interfaceId === INTERFACE_IDS.ERC165;
  }

  connect(sender: Address, overrides?: CallOverrides): this {
    return bindCaller(this, this.chain, this.address, sender, overrides);
  }

  protected get msg(): CallFrame {
    return this.chain.msg;
  }

  protected emit(event: ChainEvent) {
    this.chain.emitLog(event);
  }
}
