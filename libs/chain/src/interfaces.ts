import { Address } from '@Bazaar/type';

import { CallOverrides } from './caller';
import { StatefulAccount } from './chain';

export interface IErc165 {
  supportsInterface(interfaceId: string): boolean;
}

interface Connectable {
  connect(sender: Address, overrides?: CallOverrides): this;
}

export type Erc20TransferResult = boolean | undefined;

export interface IErc20 extends Connectable {
  readonly address: Address;
  balanceOf(owner: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(spender: Address, amount: bigint): Erc20TransferResult;
  transfer(to: Address, amount: bigint): Erc20TransferResult;
  transferFrom(from: Address, to: Address, amount: bigint): Erc20TransferResult;
}

export interface IErc721 extends IErc165, Connectable {
  readonly address: Address;
  balanceOf(owner: Address): bigint;
  ownerOf(tokenId: bigint): Address;
  getApproved(tokenId: bigint): Address;
  isApprovedForAll(owner: Address, operator: Address): boolean;
  approve(to: Address, tokenId: bigint): void;
  setApprovalForAll(operator: Address, approved: boolean): void;
  transferFrom(from: Address, to: Address, tokenId: bigint): void;
  safeTransferFrom(
    from: Address,
    to: Address,
    tokenId: bigint,
    data?: string,
  ): void;
}

export interface IErc1155 extends IErc165, Connectable {
  readonly address: Address;
  balanceOf(holder: Address, id: bigint): bigint;
  isApprovedForAll(owner: Address, operator: Address): boolean;
  setApprovalForAll(operator: Address, approved: boolean): void;
  safeTransferFrom(
    from: Address,
    to: Address,
    id: bigint,
    amount: bigint,
    data?: string,
  ): void;
}

export type RoyaltyInfo = {
  receiver: Address;
  royaltyAmount: bigint;
};

export interface IErc2981 extends IErc165 {
  royaltyInfo(tokenId: bigint, salePrice: bigint): RoyaltyInfo;
}

export interface IErc721Receiver {
  onERC721Received(
    operator: Address,
    from: Address,
    tokenId: bigint,
    data: string,
  ): string;
}

export interface IErc1155Receiver {
  onERC1155Received(
    operator: Address,
    from: Address,
    id: bigint,
    value: bigint,
    data: string,
  ): string;
}

export function isErc721Receiver(
  account: StatefulAccount,
): account is StatefulAccount & IErc721Receiver {
  return typeof Reflect.get(account, 'onERC721Received') === 'function';
}

export function isErc1155Receiver(
  account: StatefulAccount,
): account is StatefulAccount & IErc1155Receiver {
  return typeof Reflect.get(account, 'onERC1155Received') === 'function';
}
