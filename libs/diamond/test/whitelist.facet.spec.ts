import { Erc20 } from '@Bazaar/chain';
import { MarketplaceErrorCode, NATIVE_CURRENCY } from '@Bazaar/type';

import {
  Fixture,
  deployFixture,
  expectRevert,
  listingParams,
} from './marketplace.fixture';

describe('CurrencyWhitelistFacet', () => {
  let f: Fixture;

  beforeEach(() => {
    f = deployFixture();
  });

  it('adds and lists currencies', () => {
    expect(f.market.currencies.getAllowedCurrencies()).toEqual([
      NATIVE_CURRENCY,
      f.token.address,
    ]);
    expect(f.market.currencies.isCurrencyAllowed(f.token.address)).toBe(true);
    expectRevert(
      () =>
        f.market.currencies
          .connect(f.owner)
          .addAllowedCurrency(f.token.address),
      MarketplaceErrorCode.CurrencyAlreadyAllowed,
    );
  });

  it('removes a currency by moving the last one into its slot', () => {
    const second = new Erc20(f.chain, 'Second', 'TWO');
    const third = new Erc20(f.chain, 'Third', 'THREE');
    const currencies = f.market.currencies.connect(f.owner);
    currencies.addAllowedCurrency(second.address);
    currencies.addAllowedCurrency(third.address);

    currencies.removeAllowedCurrency(f.token.address);

    expect(f.market.currencies.getAllowedCurrencies()).toEqual([
      NATIVE_CURRENCY,
      third.address,
      second.address,
    ]);
    expect(f.market.currencies.isCurrencyAllowed(f.token.address)).toBe(false);
    expectRevert(
      () => currencies.removeAllowedCurrency(f.token.address),
      MarketplaceErrorCode.CurrencyNotAllowed,
    );
  });
});

describe('CollectionWhitelistFacet', () => {
  let f: Fixture;

  beforeEach(() => {
    f = deployFixture();
  });

  it('accepts only token standards it can trade', () => {
    const collections = f.market.collections.connect(f.owner);

    expectRevert(
      () => collections.addWhitelistedCollection(f.token.address),
      MarketplaceErrorCode.UnsupportedTokenStandard,
    );
    expectRevert(
      () => collections.addWhitelistedCollection(f.nft.address),
      MarketplaceErrorCode.CollectionAlreadyWhitelisted,
    );
    expect(f.market.collections.getWhitelistedCollections()).toEqual([
      f.nft.address,
      f.royaltyNft.address,
      f.items.address,
    ]);
  });

  it('removes collections', () => {
    const collections = f.market.collections.connect(f.owner);

    collections.removeWhitelistedCollection(f.nft.address);

    expect(f.market.collections.isCollectionWhitelisted(f.nft.address)).toBe(
      false,
    );
    expectRevert(
      () => collections.removeWhitelistedCollection(f.nft.address),
      MarketplaceErrorCode.CollectionNotWhitelisted,
    );
  });
});

describe('BuyerWhitelistFacet', () => {
  let f: Fixture;
  let listingId: number;

  beforeEach(() => {
    f = deployFixture();
    listingId = f.market.listings.connect(f.seller).createListing(
      listingParams({
        tokenAddress: f.nft.address,
        tokenId: 1n,
        price: 100n,
        buyerWhitelistEnabled: true,
        allowedBuyers: [f.buyer],
      }),
    );
  });

  it('populates the whitelist from the listing', () => {
    expect(f.market.buyers.getWhitelistedBuyers(listingId)).toEqual([f.buyer]);
    expect(f.market.buyers.isBuyerWhitelisted(listingId, f.buyer)).toBe(true);
    expect(f.market.buyers.isBuyerWhitelisted(listingId, f.otherBuyer)).toBe(
      false,
    );
  });

  it('lets the seller add and remove buyers', () => {
    const buyers = f.market.buyers.connect(f.seller);

    buyers.addBuyersToWhitelist(listingId, [f.otherBuyer, f.stranger]);
    buyers.removeBuyersFromWhitelist(listingId, [f.buyer]);

    expect(f.market.buyers.getWhitelistedBuyers(listingId)).toEqual([
      f.otherBuyer,
      f.stranger,
    ]);
  });

  it('lets an operator of the seller manage buyers', () => {
    f.nft.connect(f.seller).setApprovalForAll(f.operator, true);

    f.market.buyers
      .connect(f.operator)
      .addBuyersToWhitelist(listingId, [f.stranger]);

    expect(f.market.buyers.isBuyerWhitelisted(listingId, f.stranger)).toBe(
      true,
    );
  });

  it('refuses anyone else', () => {
    expectRevert(
      () =>
        f.market.buyers
          .connect(f.stranger)
          .addBuyersToWhitelist(listingId, [f.stranger]),
      MarketplaceErrorCode.NotAuthorized,
    );
  });

  it('caps the batch size', () => {
    const accounts = ['a', 'b', 'c', 'd'].map((label) =>
      f.chain.createAccount(label),
    );

    expectRevert(
      () =>
        f.market.buyers
          .connect(f.seller)
          .addBuyersToWhitelist(listingId, accounts),
      MarketplaceErrorCode.BuyerBatchTooLarge,
    );

    f.market.buyers.connect(f.owner).setBuyerWhitelistMaxBatchSize(4);
    f.market.buyers.connect(f.seller).addBuyersToWhitelist(listingId, accounts);
    expect(f.market.buyers.getWhitelistedBuyers(listingId)).toHaveLength(5);
  });

  it('refuses a whitelist on a listing that does not use one', () => {
    const openListing = f.market.listings.connect(f.seller).createListing(
      listingParams({ tokenAddress: f.nft.address, tokenId: 2n, price: 100n }),
    );

    expectRevert(
      () =>
        f.market.buyers
          .connect(f.seller)
          .addBuyersToWhitelist(openListing, [f.buyer]),
      MarketplaceErrorCode.BuyerWhitelistNotEnabled,
    );
  });

  it('forgets the whitelist when the listing goes', () => {
    f.market.listings.connect(f.seller).cancelListing(listingId);

    expect(f.market.buyers.getWhitelistedBuyers(listingId)).toEqual([]);
    expectRevert(
      () =>
        f.market.buyers.connect(f.seller).addBuyersToWhitelist(listingId, []),
      MarketplaceErrorCode.ListingNotFound,
    );
  });
});
