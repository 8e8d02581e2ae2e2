import { getAddress, isAddress } from '@ethersproject/address';
import { BadRequestException } from '@nestjs/common';

import {
  Address,
  CreateListingParams,
  ListingView,
  PurchaseListingParams,
  UpdateListingParams,
  ZERO_ADDRESS,
} from '@Bazaar/type';

const isAddressString = (item: unknown): item is string =>
  typeof item === 'string' && isAddress(item);

/**
 * Typed access to a JSON request body. Integers travel as decimal
 * strings, since JSON numbers cannot hold token amounts.
 */
export class TransactionBody {
  private constructor(private readonly fields: Record<string, unknown>) {}

  static from(body: unknown): TransactionBody {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new BadRequestException('request body must be a JSON object');
    }
    return new TransactionBody(Object.fromEntries(Object.entries(body)));
  }

  /** Account label or address the transaction is sent from. */
  sender(): string {
    const from = this.fields.from;
    if (typeof from !== 'string' || from === '') {
      throw new BadRequestException('"from" is required');
    }
    return from;
  }

  bigint(key: string, fallback?: bigint): bigint {
    const value = this.fields[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value !== 'string' || !/^\d+$/.test(value)) {
      throw new BadRequestException(
        `"${key}" must be a non-negative integer string`,
      );
    }
    return BigInt(value);
  }

  address(key: string, fallback?: Address): Address {
    const value = this.fields[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value !== 'string' || !isAddress(value)) {
      throw new BadRequestException(`"${key}" must be an address`);
    }
    return getAddress(value);
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.fields[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      throw new BadRequestException(`"${key}" must be a boolean`);
    }
    return value;
  }

  addresses(key: string): Address[] {
    const value = this.fields[key];
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value) || !value.every(isAddressString)) {
      throw new BadRequestException(`"${key}" must be a list of addresses`);
    }
    return value.map((item) => getAddress(item));
  }
}

export function createListingParams(
  body: TransactionBody,
): CreateListingParams {
  return {
    tokenAddress: body.address('tokenAddress'),
    tokenId: body.bigint('tokenId'),
    erc1155Holder: body.address('erc1155Holder', ZERO_ADDRESS),
    price: body.bigint('price'),
    currency: body.address('currency', ZERO_ADDRESS),
    desiredTokenAddress: body.address('desiredTokenAddress', ZERO_ADDRESS),
    desiredTokenId: body.bigint('desiredTokenId', 0n),
    desiredErc1155Quantity: body.bigint('desiredErc1155Quantity', 0n),
    erc1155Quantity: body.bigint('erc1155Quantity', 0n),
    buyerWhitelistEnabled: body.boolean('buyerWhitelistEnabled', false),
    partialBuyEnabled: body.boolean('partialBuyEnabled', false),
    allowedBuyers: body.addresses('allowedBuyers'),
  };
}

/** Unset fields keep the listing's current terms. */
export function updateListingParams(
  body: TransactionBody,
  current: ListingView,
): UpdateListingParams {
  return {
    listingId: current.listingId,
    price: body.bigint('price', current.price),
    currency: body.address('currency', current.currency),
    desiredTokenAddress: body.address(
      'desiredTokenAddress',
      current.desiredTokenAddress,
    ),
    desiredTokenId: body.bigint('desiredTokenId', current.desiredTokenId),
    desiredErc1155Quantity: body.bigint(
      'desiredErc1155Quantity',
      current.desiredErc1155Quantity,
    ),
    erc1155Quantity: body.bigint('erc1155Quantity', current.erc1155Quantity),
    buyerWhitelistEnabled: body.boolean(
      'buyerWhitelistEnabled',
      current.buyerWhitelistEnabled,
    ),
    partialBuyEnabled: body.boolean(
      'partialBuyEnabled',
      current.partialBuyEnabled,
    ),
    allowedBuyers: body.addresses('allowedBuyers'),
  };
}

/**
 * The expected terms are required: they are what the buyer saw, and the
 * purchase reverts if the listing has changed since.
 */
export function purchaseListingParams(
  body: TransactionBody,
  listingId: number,
): PurchaseListingParams {
  const expectedErc1155Quantity = body.bigint('expectedErc1155Quantity');
  return {
    listingId,
    expectedPrice: body.bigint('expectedPrice'),
    expectedCurrency: body.address('expectedCurrency'),
    expectedErc1155Quantity,
    expectedDesiredTokenAddress: body.address(
      'expectedDesiredTokenAddress',
      ZERO_ADDRESS,
    ),
    expectedDesiredTokenId: body.bigint('expectedDesiredTokenId', 0n),
    expectedDesiredErc1155Quantity: body.bigint(
      'expectedDesiredErc1155Quantity',
      0n,
    ),
    erc1155PurchaseQuantity: body.bigint(
      'erc1155PurchaseQuantity',
      expectedErc1155Quantity,
    ),
    desiredErc1155Holder: body.address('desiredErc1155Holder', ZERO_ADDRESS),
  };
}
