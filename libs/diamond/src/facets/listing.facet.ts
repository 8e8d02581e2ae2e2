import { detectStandard } from '@Bazaar/chain';
import {
  Address,
  AssetKind,
  CreateListingParams,
  DesiredAsset,
  Listing,
  ListingView,
  MarketplaceError,
  MarketplaceErrorCode,
  NATIVE_CURRENCY,
  PurchaseListingParams,
  PurchaseReceipt,
  StaleReason,
  TokenStandard,
  UpdateListingParams,
  ZERO_ADDRESS,
} from '@Bazaar/type';

import { erc1155QuantityOf, toListingView } from '../listing/listing.view';
import {
  approvedOrZero,
  canManageErc1155,
  canManageErc721,
  ownerOrNull,
  requireErc1155,
  requireErc20,
  requireErc721,
} from '../listing/token.access';
import { PaymentDistributor } from '../payment/payment.distributor';
import { grantBuyers } from './buyer-whitelist.facet';
import { Facet } from './facet';

type PurchaseQuote = {
  // 0 for ERC-721 listings
  quantity: bigint;
  price: bigint;
};

const EXPECTED_TERMS: [keyof ListingView, keyof PurchaseListingParams][] = [
  ['price', 'expectedPrice'],
  ['currency', 'expectedCurrency'],
  ['erc1155Quantity', 'expectedErc1155Quantity'],
  ['desiredTokenAddress', 'expectedDesiredTokenAddress'],
  ['desiredTokenId', 'expectedDesiredTokenId'],
  ['desiredErc1155Quantity', 'expectedDesiredErc1155Quantity'],
];

function fail(code: MarketplaceErrorCode, detail?: string): never {
  throw new MarketplaceError(code, detail);
}

/**
 * Listing lifecycle: create, purchase (whole, partial or swap), update,
 * cancel and the permissionless stale-listing sweep. Nothing is held in
 * escrow; assets and payments move between the parties inside the
 * purchase call.
 */
export class ListingFacet extends Facet {
  private readonly payments = new PaymentDistributor(this.diamond);

  createListing(params: CreateListingParams): number {
    this.enforceNotPaused();
    return this.diamond.guard.run(() => {
      const { registry } = this.diamond;

      if (
        !this.diamond.collections.isCollectionWhitelisted(params.tokenAddress)
      ) {
        fail(
          MarketplaceErrorCode.CollectionNotWhitelisted,
          params.tokenAddress,
        );
      }
      this.enforceCurrencyAllowed(params.currency);

      const kind = this.resolveKind(
        params.tokenAddress,
        params.erc1155Quantity,
      );
      const seller = this.resolveSeller(
        params.tokenAddress,
        params.tokenId,
        kind,
        params.erc1155Holder,
      );
      if (
        kind.standard === TokenStandard.ERC721 &&
        registry.getUniqueErc721Listing(params.tokenAddress, params.tokenId) !==
          undefined
      ) {
        fail(
          MarketplaceErrorCode.AlreadyListed,
          `${params.tokenAddress} #${params.tokenId}`,
        );
      }

      const desired = this.resolveDesired(
        params.desiredTokenAddress,
        params.desiredTokenId,
        params.desiredErc1155Quantity,
      );
      this.validateTerms(kind, params.price, params.partialBuyEnabled, desired);
      this.validateBuyerList(
        params.buyerWhitelistEnabled,
        params.allowedBuyers,
      );

      const listing: Listing = {
        listingId: registry.nextListingId(),
        feeRate: this.storage.feeRate,
        buyerWhitelistEnabled: params.buyerWhitelistEnabled,
        partialBuyEnabled: params.partialBuyEnabled,
        tokenAddress: params.tokenAddress,
        tokenId: params.tokenId,
        kind,
        price: params.price,
        seller,
        currency: params.currency,
        desired,
      };
      registry.put(listing);
      if (kind.standard === TokenStandard.ERC721) {
        registry.setUniqueErc721Listing(
          listing.tokenAddress,
          listing.tokenId,
          listing.listingId,
        );
      }
      if (params.buyerWhitelistEnabled && params.allowedBuyers.length > 0) {
        grantBuyers(this.diamond, listing.listingId, params.allowedBuyers);
      }

      this.chain.emitLog({
        name: 'ListingCreated',
        args: { listing: toListingView(listing) },
      });
      return listing.listingId;
    });
  }

  /**
   * Buys a listing. Every `expected*` field must equal the stored terms,
   * so a buyer never settles against terms changed after they looked.
   */
  purchaseListing(params: PurchaseListingParams): PurchaseReceipt {
    this.enforceNotPaused();
    return this.diamond.guard.run(() => {
      const { sender: buyer, value } = this.chain.msg;
      const listing = this.requireListing(params.listingId);
      this.enforceExpectedTerms(listing, params);

      const quote = this.quotePurchase(listing, params.erc1155PurchaseQuantity);

      if (
        listing.buyerWhitelistEnabled &&
        !this.diamond.buyers.isBuyerWhitelisted(listing.listingId, buyer)
      ) {
        fail(MarketplaceErrorCode.BuyerNotWhitelisted, buyer);
      }
      this.enforcePaymentAttached(listing.currency, quote.price, buyer, value);
      if (buyer === listing.seller) {
        fail(MarketplaceErrorCode.SameBuyerAsSeller);
      }

      const stale = this.diamond.checks.staleReason(listing, quote.quantity);
      if (stale) {
        fail(MarketplaceErrorCode.StaleListing, stale);
      }
      const desiredHolder = listing.desired
        ? this.resolveDesiredHolder(
            listing.desired,
            buyer,
            params.desiredErc1155Holder,
          )
        : null;

      this.transferAsset(
        listing.tokenAddress,
        listing.tokenId,
        listing.kind.standard,
        quote.quantity,
        listing.seller,
        buyer,
      );
      if (listing.desired && desiredHolder) {
        this.transferAsset(
          listing.desired.tokenAddress,
          listing.desired.tokenId,
          listing.desired.kind.standard,
          erc1155QuantityOf(listing.desired.kind),
          desiredHolder,
          listing.seller,
        );
      }

      const split = this.payments.distribute({
        price: quote.price,
        currency: listing.currency,
        feeRate: listing.feeRate,
        buyer,
        seller: listing.seller,
        tokenAddress: listing.tokenAddress,
        tokenId: listing.tokenId,
      });

      const remainingQuantity =
        erc1155QuantityOf(listing.kind) - quote.quantity;
      const remainingPrice = listing.price - quote.price;
      const listingRemoved = remainingQuantity === 0n;
      if (listingRemoved) {
        this.removeListing(listing);
      } else {
        this.diamond.registry.put({
          ...listing,
          kind: {
            standard: TokenStandard.ERC1155,
            quantity: remainingQuantity,
          },
          price: remainingPrice,
        });
      }

      const view = toListingView(listing);
      const receipt: PurchaseReceipt = {
        listingId: listing.listingId,
        buyer,
        seller: listing.seller,
        tokenAddress: listing.tokenAddress,
        tokenId: listing.tokenId,
        erc1155Quantity: quote.quantity,
        currency: listing.currency,
        price: quote.price,
        fee: split.fee,
        royaltyReceiver: split.royaltyReceiver,
        royaltyAmount: split.royaltyAmount,
        sellerProceeds: split.sellerProceeds,
        desiredTokenAddress: view.desiredTokenAddress,
        desiredTokenId: view.desiredTokenId,
        desiredErc1155Quantity: view.desiredErc1155Quantity,
        listingRemoved,
        remainingErc1155Quantity: remainingQuantity,
        remainingPrice: listingRemoved ? 0n : remainingPrice,
      };
      this.chain.emitLog({ name: 'ListingPurchased', args: receipt });
      if (listing.desired?.kind.standard === TokenStandard.ERC721) {
        this.cleanSwappedListing(listing.desired);
      }
      return receipt;
    });
  }

  /**
   * Rewrites the terms of a listing. The token itself cannot change, and
   * the fee rate is re-snapshotted at the current rate.
   */
  updateListing(params: UpdateListingParams): ListingView {
    this.enforceNotPaused();
    return this.diamond.guard.run(() => {
      const listing = this.requireListing(params.listingId);
      this.diamond.checks.authorizeListingOperator(listing, this.sender);
      this.enforceCurrencyAllowed(params.currency);

      const kind = this.resolveUpdatedKind(listing, params.erc1155Quantity);
      const stale = this.diamond.checks.staleReason(
        { ...listing, kind },
        erc1155QuantityOf(kind),
      );
      if (stale) {
        fail(holdingErrorCode(stale), `listing ${listing.listingId}: ${stale}`);
      }

      const desired = this.resolveDesired(
        params.desiredTokenAddress,
        params.desiredTokenId,
        params.desiredErc1155Quantity,
      );
      this.validateTerms(kind, params.price, params.partialBuyEnabled, desired);
      this.validateBuyerList(
        params.buyerWhitelistEnabled,
        params.allowedBuyers,
      );

      const updated: Listing = {
        ...listing,
        feeRate: this.storage.feeRate,
        buyerWhitelistEnabled: params.buyerWhitelistEnabled,
        partialBuyEnabled: params.partialBuyEnabled,
        kind,
        price: params.price,
        currency: params.currency,
        desired,
      };
      this.diamond.registry.put(updated);
      if (params.buyerWhitelistEnabled && params.allowedBuyers.length > 0) {
        grantBuyers(this.diamond, updated.listingId, params.allowedBuyers);
      }

      const view = toListingView(updated);
      this.chain.emitLog({ name: 'ListingUpdated', args: { listing: view } });
      return view;
    });
  }

  cancelListing(listingId: number) {
    this.diamond.guard.run(() => {
      const listing = this.requireListing(listingId);
      this.diamond.checks.authorizeListingOperator(listing, this.sender);
      this.removeListing(listing);
      this.chain.emitLog({
        name: 'ListingCancelled',
        args: { listingId, seller: listing.seller, canceller: this.sender },
      });
    });
  }

  /**
   * Removes a listing that can no longer settle: the seller gave up the
   * token, the marketplace lost its approval, or an ERC-721 collection left
   * the whitelist. Open to anyone; a listing that would still settle stays.
   */
  cleanListing(listingId: number): StaleReason {
    return this.diamond.guard.run(() => {
      const listing = this.requireListing(listingId);
      const reason = this.diamond.checks.staleReason(
        listing,
        erc1155QuantityOf(listing.kind),
        { includeCollection: true },
      );
      if (!reason) {
        return fail(
          MarketplaceErrorCode.ListingStillValid,
          `listing ${listingId}`,
        );
      }
      this.removeListing(listing);
      this.chain.emitLog({
        name: 'ListingCleaned',
        args: { listingId, seller: listing.seller, reason },
      });
      return reason;
    });
  }

  /**
   * A swap hands the desired ERC-721 to the seller, so a listing of that
   * token by its previous owner can no longer settle.
   */
  private cleanSwappedListing(desired: DesiredAsset) {
    const { registry } = this.diamond;
    const listingId = registry.getUniqueErc721Listing(
      desired.tokenAddress,
      desired.tokenId,
    );
    const swapped =
      listingId === undefined ? undefined : registry.get(listingId);
    if (!swapped) {
      return;
    }
    this.removeListing(swapped);
    this.chain.emitLog({
      name: 'ListingCleaned',
      args: {
        listingId: swapped.listingId,
        seller: swapped.seller,
        reason: 'seller-not-owner',
      },
    });
  }

  private removeListing(listing: Listing) {
    const { registry } = this.diamond;
    registry.delete(listing.listingId);
    if (
      listing.kind.standard === TokenStandard.ERC721 &&
      registry.getUniqueErc721Listing(listing.tokenAddress, listing.tokenId) ===
        listing.listingId
    ) {
      registry.clearUniqueErc721Listing(listing.tokenAddress, listing.tokenId);
    }
  }

  private enforceCurrencyAllowed(currency: Address) {
    if (!this.diamond.currencies.isCurrencyAllowed(currency)) {
      fail(MarketplaceErrorCode.CurrencyNotAllowed, currency);
    }
  }

  private resolveKind(
    tokenAddress: Address,
    erc1155Quantity: bigint,
  ): AssetKind {
    const standard = detectStandard(this.chain, tokenAddress);
    if (!standard) {
      return fail(MarketplaceErrorCode.UnsupportedTokenStandard, tokenAddress);
    }
    if (erc1155Quantity < 0n) {
      return fail(MarketplaceErrorCode.WrongQuantityParameter);
    }
    if (standard === TokenStandard.ERC721) {
      if (erc1155Quantity !== 0n) {
        fail(
          MarketplaceErrorCode.WrongQuantityParameter,
          'ERC-721 listings take no quantity',
        );
      }
      return { standard };
    }
    if (erc1155Quantity === 0n) {
      fail(
        MarketplaceErrorCode.WrongQuantityParameter,
        'ERC-1155 listings need a quantity',
      );
    }
    return { standard, quantity: erc1155Quantity };
  }

  private resolveUpdatedKind(
    listing: Listing,
    erc1155Quantity: bigint,
  ): AssetKind {
    if (listing.kind.standard === TokenStandard.ERC721) {
      if (erc1155Quantity !== 0n) {
        fail(MarketplaceErrorCode.WrongQuantityParameter);
      }
      return listing.kind;
    }
    if (erc1155Quantity <= 0n) {
      fail(MarketplaceErrorCode.WrongQuantityParameter);
    }
    return { standard: TokenStandard.ERC1155, quantity: erc1155Quantity };
  }

  /**
   * The account whose token is listed. An ERC-1155 holder cannot be read
   * from the token, so an operator must name it in `holder`.
   */
  private resolveSeller(
    tokenAddress: Address,
    tokenId: bigint,
    kind: AssetKind,
    holder: Address,
  ): Address {
    const caller = this.sender;
    const market = this.address;

    if (kind.standard === TokenStandard.ERC721) {
      const token = requireErc721(this.chain, tokenAddress);
      const owner = ownerOrNull(token, tokenId);
      if (!owner || !canManageErc721(token, owner, tokenId, caller)) {
        return fail(
          MarketplaceErrorCode.NotAuthorized,
          `${caller} does not control ${tokenAddress} #${tokenId}`,
        );
      }
      if (
        approvedOrZero(token, tokenId) !== market &&
        !token.isApprovedForAll(owner, market)
      ) {
        fail(MarketplaceErrorCode.MarketplaceNotApproved);
      }
      return owner;
    }

    const token = requireErc1155(this.chain, tokenAddress);
    const seller = holder === ZERO_ADDRESS ? caller : holder;
    if (!canManageErc1155(token, seller, caller)) {
      fail(
        MarketplaceErrorCode.NotAuthorized,
        `${caller} is not an operator of ${seller}`,
      );
    }
    const balance = token.balanceOf(seller, tokenId);
    if (balance < kind.quantity) {
      fail(
        MarketplaceErrorCode.InsufficientBalance,
        `${seller} holds ${balance} of #${tokenId}`,
      );
    }
    if (!token.isApprovedForAll(seller, market)) {
      fail(MarketplaceErrorCode.MarketplaceNotApproved);
    }
    return seller;
  }

  private resolveDesired(
    tokenAddress: Address,
    tokenId: bigint,
    erc1155Quantity: bigint,
  ): DesiredAsset | null {
    if (tokenAddress === ZERO_ADDRESS) {
      if (tokenId !== 0n || erc1155Quantity !== 0n) {
        fail(MarketplaceErrorCode.InvalidNoSwapParameters);
      }
      return null;
    }

    const standard = detectStandard(this.chain, tokenAddress);
    if (standard === TokenStandard.ERC721) {
      if (erc1155Quantity !== 0n) {
        fail(MarketplaceErrorCode.WrongQuantityParameter);
      }
      return { tokenAddress, tokenId, kind: { standard } };
    }
    if (standard === TokenStandard.ERC1155) {
      if (erc1155Quantity <= 0n) {
        fail(MarketplaceErrorCode.WrongQuantityParameter);
      }
      return {
        tokenAddress,
        tokenId,
        kind: { standard, quantity: erc1155Quantity },
      };
    }
    return fail(MarketplaceErrorCode.UnsupportedTokenStandard, tokenAddress);
  }

  private validateTerms(
    kind: AssetKind,
    price: bigint,
    partialBuyEnabled: boolean,
    desired: DesiredAsset | null,
  ) {
    if (price < 0n) {
      fail(MarketplaceErrorCode.InvalidAmount, 'price');
    }
    if (!desired && price === 0n) {
      fail(MarketplaceErrorCode.FreeListingNotSupported);
    }
    if (!partialBuyEnabled) {
      return;
    }
    if (kind.standard !== TokenStandard.ERC1155 || desired) {
      fail(
        MarketplaceErrorCode.PartialBuyNotPossible,
        'partial buys need an ERC-1155 listing without swap',
      );
    } else if (price % kind.quantity !== 0n) {
      fail(
        MarketplaceErrorCode.InvalidUnitPrice,
        `${price} is not divisible by ${kind.quantity}`,
      );
    }
  }

  private validateBuyerList(enabled: boolean, buyers: Address[]) {
    if (!enabled && buyers.length > 0) {
      fail(
        MarketplaceErrorCode.BuyerWhitelistNotEnabled,
        'buyers given while the buyer whitelist is disabled',
      );
    }
  }

  private enforceExpectedTerms(
    listing: Listing,
    params: PurchaseListingParams,
  ) {
    const view = toListingView(listing);
    for (const [stored, expected] of EXPECTED_TERMS) {
      if (view[stored] !== params[expected]) {
        fail(
          MarketplaceErrorCode.ListingTermsChanged,
          `${stored} is ${view[stored]}, expected ${params[expected]}`,
        );
      }
    }
  }

  private quotePurchase(listing: Listing, requested: bigint): PurchaseQuote {
    if (listing.kind.standard === TokenStandard.ERC721) {
      if (requested !== 0n) {
        fail(
          MarketplaceErrorCode.InvalidPurchaseQuantity,
          'ERC-721 listings are bought whole',
        );
      }
      return { quantity: 0n, price: listing.price };
    }

    const available = listing.kind.quantity;
    if (requested <= 0n || requested > available) {
      fail(
        MarketplaceErrorCode.InvalidPurchaseQuantity,
        `${requested} of ${available}`,
      );
    }
    if (requested === available) {
      return { quantity: requested, price: listing.price };
    }
    if (!listing.partialBuyEnabled) {
      fail(MarketplaceErrorCode.PartialBuyNotPossible);
    }
    // Unit price first, then scale: the rounding is part of the terms.
    return {
      quantity: requested,
      price: (listing.price / available) * requested,
    };
  }

  private enforcePaymentAttached(
    currency: Address,
    price: bigint,
    buyer: Address,
    value: bigint,
  ) {
    if (currency === NATIVE_CURRENCY) {
      if (value !== price) {
        fail(
          MarketplaceErrorCode.WrongPaymentCurrency,
          `attach exactly ${price}, got ${value}`,
        );
      }
      return;
    }

    if (value !== 0n) {
      fail(
        MarketplaceErrorCode.WrongPaymentCurrency,
        'token listings take no native value',
      );
    }
    const allowance = requireErc20(this.chain, currency).allowance(
      buyer,
      this.address,
    );
    if (allowance < price) {
      fail(
        MarketplaceErrorCode.InsufficientAllowance,
        `allowance ${allowance}, price ${price}`,
      );
    }
  }

  /** Account the desired swap asset is taken from. */
  private resolveDesiredHolder(
    desired: DesiredAsset,
    buyer: Address,
    holder: Address,
  ): Address {
    const market = this.address;

    if (desired.kind.standard === TokenStandard.ERC721) {
      const token = requireErc721(this.chain, desired.tokenAddress);
      const owner = ownerOrNull(token, desired.tokenId);
      if (!owner || !canManageErc721(token, owner, desired.tokenId, buyer)) {
        return fail(
          MarketplaceErrorCode.NotAuthorized,
          `${buyer} does not control the desired token`,
        );
      }
      if (
        approvedOrZero(token, desired.tokenId) !== market &&
        !token.isApprovedForAll(owner, market)
      ) {
        fail(MarketplaceErrorCode.MarketplaceNotApproved, 'desired token');
      }
      return owner;
    }

    const token = requireErc1155(this.chain, desired.tokenAddress);
    const from = holder === ZERO_ADDRESS ? buyer : holder;
    if (
      !canManageErc1155(token, from, buyer) ||
      token.balanceOf(from, desired.tokenId) < desired.kind.quantity
    ) {
      fail(
        MarketplaceErrorCode.WrongHolderParameter,
        `${from} cannot supply ${desired.kind.quantity} of #${desired.tokenId}`,
      );
    }
    if (!token.isApprovedForAll(from, market)) {
      fail(MarketplaceErrorCode.MarketplaceNotApproved, 'desired token');
    }
    return from;
  }

  private transferAsset(
    tokenAddress: Address,
    tokenId: bigint,
    standard: TokenStandard,
    quantity: bigint,
    from: Address,
    to: Address,
  ) {
    if (standard === TokenStandard.ERC721) {
      requireErc721(this.chain, tokenAddress)
        .connect(this.address)
        .safeTransferFrom(from, to, tokenId);
    } else {
      requireErc1155(this.chain, tokenAddress)
        .connect(this.address)
        .safeTransferFrom(from, to, tokenId, quantity, '0x');
    }
  }
}

function holdingErrorCode(reason: StaleReason): MarketplaceErrorCode {
  switch (reason) {
    case 'insufficient-balance':
      return MarketplaceErrorCode.InsufficientBalance;
    case 'marketplace-not-approved':
      return MarketplaceErrorCode.MarketplaceNotApproved;
    default:
      return MarketplaceErrorCode.StaleListing;
  }
}
