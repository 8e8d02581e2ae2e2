import {
  Address,
  INTERFACE_IDS,
  InterfaceId,
  TokenStandard,
} from '@Bazaar/type';

import { Chain, StatefulAccount } from './chain';
import { IErc1155, IErc20, IErc2981, IErc721 } from './interfaces';

function answersInterface(
  account: StatefulAccount,
  interfaceId: InterfaceId,
): boolean {
  const supportsInterface: unknown = Reflect.get(account, 'supportsInterface');
  if (typeof supportsInterface !== 'function') {
    return false;
  }
  try {
    return supportsInterface.call(account, interfaceId) === true;
  } catch {
    // A reverting query means the interface is not supported.
    return false;
  }
}

export function supportsInterface(
  chain: Chain,
  address: Address,
  interfaceId: InterfaceId,
): boolean {
  const account = chain.accountAt(address);
  return !!account && answersInterface(account, interfaceId);
}

export function detectStandard(
  chain: Chain,
  address: Address,
): TokenStandard | null {
  if (supportsInterface(chain, address, INTERFACE_IDS.ERC721)) {
    return TokenStandard.ERC721;
  }
  if (supportsInterface(chain, address, INTERFACE_IDS.ERC1155)) {
    return TokenStandard.ERC1155;
  }
  return null;
}

function isErc721(
  account: StatefulAccount,
): account is StatefulAccount & IErc721 {
  return answersInterface(account, INTERFACE_IDS.ERC721);
}

function isErc1155(
  account: StatefulAccount,
): account is StatefulAccount & IErc1155 {
  return answersInterface(account, INTERFACE_IDS.ERC1155);
}

function isErc2981(
  account: StatefulAccount,
): account is StatefulAccount & IErc2981 {
  return answersInterface(account, INTERFACE_IDS.ERC2981);
}

function isErc20(
  account: StatefulAccount,
): account is StatefulAccount & IErc20 {
  return ['transferFrom', 'allowance', 'balanceOf'].every(
    (method) => typeof Reflect.get(account, method) === 'function',
  );
}

export function erc721At(chain: Chain, address: Address): IErc721 | undefined {
  const account = chain.accountAt(address);
  return account && isErc721(account) ? account : undefined;
}

export function erc1155At(
  chain: Chain,
  address: Address,
): IErc1155 | undefined {
  const account = chain.accountAt(address);
  return account && isErc1155(account) ? account : undefined;
}

export function erc2981At(
  chain: Chain,
  address: Address,
): IErc2981 | undefined {
  const account = chain.accountAt(address);
  return account && isErc2981(account) ? account : undefined;
}

export function erc20At(chain: Chain, address: Address): IErc20 | undefined {
  const account = chain.accountAt(address);
  return account && isErc20(account) ? account : undefined;
}
