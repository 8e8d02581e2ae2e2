import { AddressZero } from '@ethersproject/constants';

export type Address = string;

export type Network = 'devnet' | 'testnet' | 'mainnet';

export const NETWORKS: Network[] = ['devnet', 'testnet', 'mainnet'];

export function isNetwork(value: string): value is Network {
  return NETWORKS.some((network) => network === value);
}

export const ZERO_ADDRESS: Address = AddressZero;

// Currency identity used for the chain's base asset.
export const NATIVE_CURRENCY: Address = AddressZero;

// Fee rates are fractions of this denominator (1000 = 1%).
export const FEE_DENOMINATOR = 100_000n;

export enum TokenStandard {
  ERC721 = 'ERC721',
  ERC1155 = 'ERC1155',
}

export const INTERFACE_IDS = {
  ERC165: '0x01ffc9a7',
  ERC721: '0x80ac58cd',
  ERC1155: '0xd9b67a26',
  ERC2981: '0x2a55205a',
} as const;

export type InterfaceId = (typeof INTERFACE_IDS)[keyof typeof INTERFACE_IDS];

export const ERC721_RECEIVED = '0x150b7a02';
export const ERC1155_RECEIVED = '0xf23a6e61';
