import {
  Chain,
  ChainError,
  IErc1155,
  IErc20,
  IErc721,
  erc1155At,
  erc20At,
  erc721At,
} from '@Bazaar/chain';
import {
  Address,
  MarketplaceError,
  MarketplaceErrorCode,
  ZERO_ADDRESS,
} from '@Bazaar/type';

export function requireErc721(chain: Chain, address: Address): IErc721 {
  const token = erc721At(chain, address);
  if (!token) {
    throw new MarketplaceError(
      MarketplaceErrorCode.UnsupportedTokenStandard,
      `${address} is not ERC-721`,
    );
  }
  return token;
}

export function requireErc1155(chain: Chain, address: Address): IErc1155 {
  const token = erc1155At(chain, address);
  if (!token) {
    throw new MarketplaceError(
      MarketplaceErrorCode.UnsupportedTokenStandard,
      `${address} is not ERC-1155`,
    );
  }
  return token;
}

export function requireErc20(chain: Chain, address: Address): IErc20 {
  const token = erc20At(chain, address);
  if (!token) {
    throw new MarketplaceError(
      MarketplaceErrorCode.TokenTransferFailed,
      `${address} is not a token contract`,
    );
  }
  return token;
}

/** `ownerOf` that reads a burned or never-minted token as unowned. */
export function ownerOrNull(token: IErc721, tokenId: bigint): Address | null {
  try {
    return token.ownerOf(tokenId);
  } catch (err) {
    if (err instanceof ChainError) {
      return null;
    }
    throw err;
  }
}

export function approvedOrZero(token: IErc721, tokenId: bigint): Address {
  try {
    return token.getApproved(tokenId);
  } catch (err) {
    if (err instanceof ChainError) {
      return ZERO_ADDRESS;
    }
    throw err;
  }
}

/** Owner, single-token approvee or operator of `owner`. */
export function canManageErc721(
  token: IErc721,
  owner: Address,
  tokenId: bigint,
  account: Address,
): boolean {
  return (
    account === owner ||
    approvedOrZero(token, tokenId) === account ||
    token.isApprovedForAll(owner, account)
  );
}

export function canManageErc1155(
  token: IErc1155,
  holder: Address,
  account: Address,
): boolean {
  return account === holder || token.isApprovedForAll(holder, account);
}
