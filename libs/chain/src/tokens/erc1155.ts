import {
  Address,
  ERC1155_RECEIVED,
  INTERFACE_IDS,
  ZERO_ADDRESS,
} from '@Bazaar/type';

import { Chain } from '../chain';
import { ChainError, ChainErrorCode } from '../chain.error';
import { Contract } from '../contract';
import {
  IErc1155,
  IErc2981,
  RoyaltyInfo,
  isErc1155Receiver,
} from '../interfaces';
import { RoyaltyConfig, computeRoyalty } from './royalty';

type Erc1155State = {
  balances: Map<string, bigint>;
  operatorApprovals: Map<string, boolean>;
  royalty: RoyaltyConfig | null;
};

export type Erc1155Options = {
  royalty?: RoyaltyConfig;
};

const balanceKey = (id: bigint, holder: Address) => `${id}:${holder}`;

export class Erc1155
  extends Contract<Erc1155State>
  implements IErc1155, IErc2981
{
  protected readonly state: Erc1155State;
  private readonly royaltyEnabled: boolean;

  constructor(
    chain: Chain,
    readonly name: string,
    options: Erc1155Options = {},
  ) {
    super(chain, `erc1155:${name}`);
    this.royaltyEnabled = !!options.royalty;
    this.state = {
      balances: new Map(),
      operatorApprovals: new Map(),
      royalty: options.royalty ?? null,
    };
  }

  supportsInterface(interfaceId: string): boolean {
    return (
      interfaceId === INTERFACE_IDS.ERC1155 ||
      (this.royaltyEnabled && interfaceId === INTERFACE_IDS.ERC2981) ||
      super.supportsInterface(interfaceId)
    );
  }

  balanceOf(holder: Address, id: bigint): bigint {
    return this.state.balances.get(balanceKey(id, holder)) ?? 0n;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.state.operatorApprovals.get(`${owner}:${operator}`) ?? false;
  }

  setApprovalForAll(operator: Address, approved: boolean) {
    const owner = this.msg.sender;
    this.state.operatorApprovals.set(`${owner}:${operator}`, approved);
    this.emit({ name: 'ApprovalForAll', args: { owner, operator, approved } });
  }

  safeTransferFrom(
    from: Address,
    to: Address,
    id: bigint,
    amount: bigint,
    data = '0x',
  ) {
    const operator = this.msg.sender;
    if (operator !== from && !this.isApprovedForAll(from, operator)) {
      throw new ChainError(
        ChainErrorCode.NotApproved,
        `${operator} cannot move ${this.name} #${id} of ${from}`,
      );
    }
    if (to === ZERO_ADDRESS) {
      throw new ChainError(ChainErrorCode.ZeroAddress);
    }
    if (amount < 0n) {
      throw new ChainError(ChainErrorCode.InvalidAmount);
    }
    const balance = this.balanceOf(from, id);
    if (balance < amount) {
      throw new ChainError(
        ChainErrorCode.InsufficientBalance,
        `${from} holds ${balance} of #${id}, needs ${amount}`,
      );
    }

    this.state.balances.set(balanceKey(id, from), balance - amount);
    this.state.balances.set(
      balanceKey(id, to),
      this.balanceOf(to, id) + amount,
    );
    this.emit({
      name: 'TransferSingle',
      args: { operator, from, to, id, value: amount },
    });

    const receiver = this.chain.accountAt(to);
    if (!receiver) {
      return;
    }
    const accepted =
      isErc1155Receiver(receiver) &&
      this.chain.call(this.address, to, 0n, () =>
        receiver.onERC1155Received(operator, from, id, amount, data),
      ) === ERC1155_RECEIVED;
    if (!accepted) {
      throw new ChainError(ChainErrorCode.InvalidReceiver, to);
    }
  }

  royaltyInfo(id: bigint, salePrice: bigint): RoyaltyInfo {
    return computeRoyalty(this.state.royalty, salePrice);
  }

  setRoyalty(royalty: RoyaltyConfig | null) {
    this.state.royalty = royalty;
  }

  mint(to: Address, id: bigint, amount: bigint) {
    if (to === ZERO_ADDRESS) {
      throw new ChainError(ChainErrorCode.ZeroAddress);
    }
    this.state.balances.set(
      balanceKey(id, to),
      this.balanceOf(to, id) + amount,
    );
  }
}
