import {
  CreateListingParams,
  ListingView,
  MarketplaceErrorCode,
  UpdateListingParams,
} from '@Bazaar/type';

import {
  Fixture,
  deployFixture,
  expectRevert,
  listingParams,
  updateParams,
} from './marketplace.fixture';

describe('listing maintenance', () => {
  let f: Fixture;

  beforeEach(() => {
    f = deployFixture();
  });

  function list(
    overrides: Partial<CreateListingParams> = {},
    sender = f.seller,
  ): ListingView {
    const listingId = f.market.listings.connect(sender).createListing(
      listingParams({
        tokenAddress: f.nft.address,
        tokenId: 1n,
        price: 100n,
        ...overrides,
      }),
    );
    const view = f.market.getters.getListing(listingId);
    if (!view) {
      throw new Error('listing was not stored');
    }
    return view;
  }

  const listItems = (overrides: Partial<CreateListingParams> = {}) =>
    list({
      tokenAddress: f.items.address,
      tokenId: 7n,
      erc1155Quantity: 10n,
      price: 1000n,
      ...overrides,
    });

  const lastEvent = () => f.chain.logs[f.chain.logs.length - 1].event;

  describe('updateListing', () => {
    const update = (
      view: ListingView,
      overrides: Partial<UpdateListingParams> = {},
      sender = f.seller,
    ) =>
      f.market.listings
        .connect(sender)
        .updateListing(updateParams(view, overrides));

    it('rewrites the terms at the current fee rate', () => {
      const view = list();
      f.admin.setFeeRate(2000n);

      const updated = update(view, { price: 250n, currency: f.token.address });

      expect(updated).toEqual({
        ...view,
        feeRate: 2000n,
        price: 250n,
        currency: f.token.address,
      });
      expect(f.market.getters.getListing(view.listingId)).toEqual(updated);
      expect(lastEvent()).toEqual({
        name: 'ListingUpdated',
        args: { listing: updated },
      });
    });

    it('resizes an ERC-1155 lot', () => {
      const view = listItems();

      const updated = update(view, {
        erc1155Quantity: 20n,
        price: 2000n,
        partialBuyEnabled: true,
      });

      expect(updated).toMatchObject({
        erc1155Quantity: 20n,
        price: 2000n,
        partialBuyEnabled: true,
      });
    });

    it('turns on the buyer whitelist', () => {
      const view = list();

      update(view, {
        buyerWhitelistEnabled: true,
        allowedBuyers: [f.buyer, f.otherBuyer],
      });

      expect(f.market.buyers.getWhitelistedBuyers(view.listingId)).toEqual([
        f.buyer,
        f.otherBuyer,
      ]);
    });

    it('lets an approved operator update', () => {
      const view = list();
      f.nft.connect(f.seller).setApprovalForAll(f.operator, true);

      expect(update(view, { price: 150n }, f.operator).price).toBe(150n);
    });

    it('rechecks the operator approval', () => {
      const view = list();
      f.nft.connect(f.seller).setApprovalForAll(f.operator, true);
      f.nft.connect(f.seller).setApprovalForAll(f.operator, false);

      expectRevert(
        () => update(view, {}, f.operator),
        MarketplaceErrorCode.NotAuthorized,
      );
    });

    it('rejects a currency off the allowlist', () => {
      const view = list();

      expectRevert(
        () => update(view, { currency: f.stranger }),
        MarketplaceErrorCode.CurrencyNotAllowed,
      );
    });

    it('rejects more units than the seller holds', () => {
      const view = listItems();

      expectRevert(
        () => update(view, { erc1155Quantity: 101n, price: 1010n }),
        MarketplaceErrorCode.InsufficientBalance,
      );
    });

    it('rejects a lot the marketplace can no longer move', () => {
      const view = listItems();
      f.items.connect(f.seller).setApprovalForAll(f.market.address, false);

      expectRevert(
        () => update(view),
        MarketplaceErrorCode.MarketplaceNotApproved,
      );
    });

    it('rejects an ERC-721 the seller gave away', () => {
      const view = list();
      f.nft.connect(f.seller).transferFrom(f.seller, f.stranger, 1n);

      expectRevert(() => update(view), MarketplaceErrorCode.StaleListing);
    });

    it('applies the creation rules', () => {
      const view = list();

      expectRevert(
        () => update(view, { erc1155Quantity: 1n }),
        MarketplaceErrorCode.WrongQuantityParameter,
      );
      expectRevert(
        () => update(view, { price: 0n }),
        MarketplaceErrorCode.FreeListingNotSupported,
      );
      expectRevert(
        () => update(view, { allowedBuyers: [f.buyer] }),
        MarketplaceErrorCode.BuyerWhitelistNotEnabled,
      );
    });

    it('is blocked while paused', () => {
      const view = list();
      f.admin.pause();

      expectRevert(() => update(view), MarketplaceErrorCode.ContractPaused);
    });
  });

  describe('cancelListing', () => {
    it('removes the listing and frees the token for relisting', () => {
      const view = list();

      f.market.listings.connect(f.seller).cancelListing(view.listingId);

      expect(f.market.getters.getListing(view.listingId)).toBeUndefined();
      expect(
        f.market.getters.getErc721ListingId(f.nft.address, 1n),
      ).toBeUndefined();
      expect(lastEvent()).toEqual({
        name: 'ListingCancelled',
        args: {
          listingId: view.listingId,
          seller: f.seller,
          canceller: f.seller,
        },
      });
      expect(list().listingId).toBe(2);
    });

    it('lets the token approvee cancel', () => {
      const view = list();
      f.nft.connect(f.seller).approve(f.operator, 1n);

      f.market.listings.connect(f.operator).cancelListing(view.listingId);

      expect(lastEvent()).toEqual({
        name: 'ListingCancelled',
        args: {
          listingId: view.listingId,
          seller: f.seller,
          canceller: f.operator,
        },
      });
    });

    it('refuses anyone else', () => {
      const view = list();

      expectRevert(
        () =>
          f.market.listings
            .connect(f.stranger)
            .cancelListing(view.listingId),
        MarketplaceErrorCode.NotAuthorized,
      );
    });

    it('still works while paused', () => {
      const view = list();
      f.admin.pause();

      f.market.listings.connect(f.seller).cancelListing(view.listingId);

      expect(f.market.getters.getListing(view.listingId)).toBeUndefined();
    });

    it('reports unknown listings', () => {
      expectRevert(
        () => f.market.listings.connect(f.seller).cancelListing(42),
        MarketplaceErrorCode.ListingNotFound,
      );
    });
  });

  describe('cleanListing', () => {
    const clean = (listingId: number) =>
      f.market.listings.connect(f.stranger).cleanListing(listingId);

    it('keeps a listing that would still settle', () => {
      const view = list();

      expect(f.market.getters.getListingStaleReason(view.listingId)).toBeNull();
      expectRevert(
        () => clean(view.listingId),
        MarketplaceErrorCode.ListingStillValid,
      );
      expect(f.market.getters.getListing(view.listingId)).toEqual(view);
    });

    it('removes an ERC-721 its seller no longer owns', () => {
      const view = list();
      f.nft.connect(f.seller).transferFrom(f.seller, f.buyer, 1n);

      expect(clean(view.listingId)).toBe('seller-not-owner');
      expect(f.market.getters.getListing(view.listingId)).toBeUndefined();
      expect(lastEvent()).toEqual({
        name: 'ListingCleaned',
        args: {
          listingId: view.listingId,
          seller: f.seller,
          reason: 'seller-not-owner',
        },
      });
    });

    it('removes a listing the marketplace may no longer move', () => {
      const view = list();
      f.nft.connect(f.seller).setApprovalForAll(f.market.address, false);

      expect(clean(view.listingId)).toBe('marketplace-not-approved');
    });

    it('removes an ERC-1155 lot the seller no longer covers', () => {
      const view = listItems();
      f.items
        .connect(f.seller)
        .safeTransferFrom(f.seller, f.buyer, 7n, 95n, '0x');

      expect(clean(view.listingId)).toBe('insufficient-balance');
    });

    it('removes an ERC-721 whose collection left the whitelist', () => {
      const view = list();
      f.market.collections
        .connect(f.owner)
        .removeWhitelistedCollection(f.nft.address);

      expect(clean(view.listingId)).toBe('collection-not-whitelisted');
    });

    it('keeps an ERC-1155 lot whose collection left the whitelist', () => {
      const view = listItems();
      f.market.collections
        .connect(f.owner)
        .removeWhitelistedCollection(f.items.address);

      expectRevert(
        () => clean(view.listingId),
        MarketplaceErrorCode.ListingStillValid,
      );
    });

    it('frees a token held by a new owner for listing', () => {
      const stale = list();
      f.nft.connect(f.seller).transferFrom(f.seller, f.stranger, 1n);
      f.nft.connect(f.stranger).setApprovalForAll(f.market.address, true);

      expectRevert(
        () => list({}, f.stranger),
        MarketplaceErrorCode.AlreadyListed,
      );

      clean(stale.listingId);
      const fresh = list({}, f.stranger);

      expect(fresh).toMatchObject({ listingId: 2, seller: f.stranger });
      expect(f.market.getters.getErc721ListingId(f.nft.address, 1n)).toBe(2);
    });
  });
});
