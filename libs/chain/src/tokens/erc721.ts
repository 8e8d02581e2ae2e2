import {
  Address,
  ERC721_RECEIVED,
  INTERFACE_IDS,
  ZERO_ADDRESS,
} from '@Bazaar/type';

import { Chain } from '../chain';
import { ChainError, ChainErrorCode } from '../chain.error';
import { Contract } from '../contract';
import {
  IErc2981,
  IErc721,
  RoyaltyInfo,
  isErc721Receiver,
} from '../interfaces';
import { RoyaltyConfig, computeRoyalty } from './royalty';

type Erc721State = {
  owners: Map<string, Address>;
  balances: Map<Address, bigint>;
  tokenApprovals: Map<string, Address>;
  operatorApprovals: Map<string, boolean>;
  royalty: RoyaltyConfig | null;
};

export type Erc721Options = {
  // Advertises ERC-2981 when set at deployment.
  royalty?: RoyaltyConfig;
};

const key = (tokenId: bigint) => tokenId.toString();

export class Erc721 extends Contract<Erc721State> implements IErc721, IErc2981 {
  protected readonly state: Erc721State;
  private readonly royaltyEnabled: boolean;

  constructor(
    chain: Chain,
    readonly name: string,
    options: Erc721Options = {},
  ) {
    super(chain, `erc721:${name}`);
    this.royaltyEnabled = !!options.royalty;
    this.state = {
      owners: new Map(),
      balances: new Map(),
      tokenApprovals: new Map(),
      operatorApprovals: new Map(),
      royalty: options.royalty ?? null,
    };
  }

  supportsInterface(interfaceId: string): boolean {
    return (
      interfaceId === INTERFACE_IDS.ERC721 ||
      (this.royaltyEnabled && interfaceId === INTERFACE_IDS.ERC2981) ||
      super.supportsInterface(interfaceId)
    );
  }

  balanceOf(owner: Address): bigint {
    return this.state.balances.get(owner) ?? 0n;
  }

  ownerOf(tokenId: bigint): Address {
    const owner = this.state.owners.get(key(tokenId));
    if (!owner) {
      throw new ChainError(
        ChainErrorCode.NonexistentToken,
        `${this.name} #${tokenId}`,
      );
    }
    return owner;
  }

  getApproved(tokenId: bigint): Address {
    this.ownerOf(tokenId);
    return this.state.tokenApprovals.get(key(tokenId)) ?? ZERO_ADDRESS;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.state.operatorApprovals.get(`${owner}:${operator}`) ?? false;
  }

  approve(to: Address, tokenId: bigint) {
    const owner = this.ownerOf(tokenId);
    const sender = this.msg.sender;
    if (sender !== owner && !this.isApprovedForAll(owner, sender)) {
      throw new ChainError(
        ChainErrorCode.NotApproved,
        `${sender} cannot approve`,
      );
    }
    this.state.tokenApprovals.set(key(tokenId), to);
    this.emit({ name: 'NftApproval', args: { owner, approved: to, tokenId } });
  }

  setApprovalForAll(operator: Address, approved: boolean) {
    const owner = this.msg.sender;
    this.state.operatorApprovals.set(`${owner}:${operator}`, approved);
    this.emit({ name: 'ApprovalForAll', args: { owner, operator, approved } });
  }

  transferFrom(from: Address, to: Address, tokenId: bigint) {
    const owner = this.ownerOf(tokenId);
    const spender = this.msg.sender;
    if (owner !== from) {
      throw new ChainError(ChainErrorCode.NotTokenOwner, `${from} #${tokenId}`);
    }
    if (to === ZERO_ADDRESS) {
      throw new ChainError(ChainErrorCode.ZeroAddress);
    }
    if (
      spender !== owner &&
      this.getApproved(tokenId) !== spender &&
      !this.isApprovedForAll(owner, spender)
    ) {
      throw new ChainError(
        ChainErrorCode.NotApproved,
        `${spender} cannot move ${this.name} #${tokenId}`,
      );
    }

    this.state.tokenApprovals.delete(key(tokenId));
    this.state.balances.set(from, this.balanceOf(from) - 1n);
    this.state.balances.set(to, this.balanceOf(to) + 1n);
    this.state.owners.set(key(tokenId), to);
    this.emit({ name: 'NftTransfer', args: { from, to, tokenId } });
  }

  safeTransferFrom(from: Address, to: Address, tokenId: bigint, data = '0x') {
    this.transferFrom(from, to, tokenId);

    const receiver = this.chain.accountAt(to);
    if (!receiver) {
      return;
    }
    const operator = this.msg.sender;
    const accepted =
      isErc721Receiver(receiver) &&
      this.chain.call(this.address, to, 0n, () =>
        receiver.onERC721Received(operator, from, tokenId, data),
      ) === ERC721_RECEIVED;
    if (!accepted) {
      throw new ChainError(ChainErrorCode.InvalidReceiver, to);
    }
  }

  royaltyInfo(tokenId: bigint, salePrice: bigint): RoyaltyInfo {
    return computeRoyalty(this.state.royalty, salePrice);
  }

  setRoyalty(royalty: RoyaltyConfig | null) {
    this.state.royalty = royalty;
  }

  mint(to: Address, tokenId: bigint) {
    if (to === ZERO_ADDRESS) {
      throw new ChainError(ChainErrorCode.ZeroAddress);
    }
    if (this.state.owners.has(key(tokenId))) {
      throw new ChainError(ChainErrorCode.TokenAlreadyMinted, `#${tokenId}`);
    }
    this.state.owners.set(key(tokenId), to);
    this.state.balances.set(to, this.balanceOf(to) + 1n);
  }

  burn(tokenId: bigint) {
    const owner = this.ownerOf(tokenId);
    this.state.owners.delete(key(tokenId));
    this.state.tokenApprovals.delete(key(tokenId));
    this.state.balances.set(owner, this.balanceOf(owner) - 1n);
  }
}
