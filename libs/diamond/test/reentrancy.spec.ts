import { ChainErrorCode } from '@Bazaar/chain';
import {
  Address,
  ListingView,
  MarketplaceErrorCode,
  NATIVE_CURRENCY,
} from '@Bazaar/type';

import { PlainContract, ReentrantErc20, ReentrantReceiver } from './attackers';
import {
  FUNDS,
  Fixture,
  captureError,
  deployFixture,
  expectRevert,
  listingParams,
  purchaseParams,
} from './marketplace.fixture';

describe('reentrancy', () => {
  let f: Fixture;

  beforeEach(() => {
    f = deployFixture();
  });

  function list(
    seller: Address,
    tokenId: bigint,
    currency = NATIVE_CURRENCY,
  ): ListingView {
    const listingId = f.market.listings.connect(seller).createListing(
      listingParams({
        tokenAddress: f.nft.address,
        tokenId,
        price: 100n,
        currency,
      }),
    );
    const view = f.market.getters.getListing(listingId);
    if (!view) {
      throw new Error('listing was not stored');
    }
    return view;
  }

  function contractSeller(propagate: boolean) {
    const seller = new ReentrantReceiver(f.chain, propagate);
    f.nft.mint(seller.address, 20n);
    f.nft.connect(seller.address).setApprovalForAll(f.market.address, true);
    return seller;
  }

  it('nests a guarded call and fails it', () => {
    expectRevert(
      () => f.market.guard.run(() => f.market.guard.run(() => 1)),
      MarketplaceErrorCode.ReentrantCall,
    );
    expect(f.market.guard.locked).toBe(false);
  });

  it('blocks a seller re-entering from the native payment', () => {
    const seller = contractSeller(false);
    const view = list(seller.address, 20n);
    seller.attack = () =>
      f.market.listings.connect(seller.address).cancelListing(view.listingId);

    f.market.listings
      .connect(f.buyer, { value: 100n })
      .purchaseListing(purchaseParams(view));

    expect(seller.reentryError).toBe(MarketplaceErrorCode.ReentrantCall);
    expect(f.chain.balanceOf(seller.address)).toBe(99n);
    expect(f.nft.ownerOf(20n)).toBe(f.buyer);
    expect(f.market.guard.locked).toBe(false);
  });

  it('fails the purchase when the blocked re-entry reverts the payment', () => {
    const seller = contractSeller(true);
    const view = list(seller.address, 20n);
    seller.attack = () =>
      f.market.listings.connect(seller.address).cancelListing(view.listingId);

    expectRevert(
      () =>
        f.market.listings
          .connect(f.buyer, { value: 100n })
          .purchaseListing(purchaseParams(view)),
      MarketplaceErrorCode.NativeTransferFailed,
    );
    expect(seller.reentryError).toBe(MarketplaceErrorCode.ReentrantCall);
    expect(f.chain.balanceOf(f.buyer)).toBe(FUNDS);
    expect(f.nft.ownerOf(20n)).toBe(seller.address);
    expect(f.market.getters.getListing(view.listingId)).toEqual(view);
    expect(f.market.guard.locked).toBe(false);
  });

  it('blocks a buyer re-entering from the ERC-721 receipt hook', () => {
    const buyer = new ReentrantReceiver(f.chain);
    f.chain.setBalance(buyer.address, 1000n);
    const first = list(f.seller, 1n);
    const second = list(f.seller, 2n);
    buyer.attack = () =>
      f.market.listings
        .connect(buyer.address, { value: 100n })
        .purchaseListing(purchaseParams(second));

    f.market.listings
      .connect(buyer.address, { value: 100n })
      .purchaseListing(purchaseParams(first));

    expect(buyer.reentryError).toBe(MarketplaceErrorCode.ReentrantCall);
    expect(f.nft.ownerOf(1n)).toBe(buyer.address);
    expect(f.nft.ownerOf(2n)).toBe(f.seller);
    expect(f.chain.balanceOf(buyer.address)).toBe(900n);
  });

  it('blocks a buyer re-entering from the ERC-1155 receipt hook', () => {
    const buyer = new ReentrantReceiver(f.chain);
    f.chain.setBalance(buyer.address, 1000n);
    const listingId = f.market.listings.connect(f.seller).createListing(
      listingParams({
        tokenAddress: f.items.address,
        tokenId: 7n,
        erc1155Quantity: 5n,
        price: 500n,
      }),
    );
    buyer.attack = () =>
      f.market.listings.connect(buyer.address).cancelListing(listingId);

    const view = f.market.getters.getListing(listingId);
    if (!view) {
      throw new Error('listing was not stored');
    }
    f.market.listings
      .connect(buyer.address, { value: 500n })
      .purchaseListing(purchaseParams(view));

    expect(buyer.reentryError).toBe(MarketplaceErrorCode.ReentrantCall);
    expect(f.items.balanceOf(buyer.address, 7n)).toBe(5n);
  });

  it('blocks a token calling back during payment', () => {
    const hook = new ReentrantErc20(f.chain, 'Hook Dollar', 'HOOK');
    f.market.currencies.connect(f.owner).addAllowedCurrency(hook.address);
    hook.mint(f.buyer, 100n);
    hook.connect(f.buyer).approve(f.market.address, 100n);
    const view = list(f.seller, 1n, hook.address);
    const other = list(f.seller, 2n);
    hook.attack = () =>
      f.market.listings
        .connect(f.buyer, { value: 100n })
        .purchaseListing(purchaseParams(other));

    f.market.listings.connect(f.buyer).purchaseListing(purchaseParams(view));

    expect(hook.reentryError).toBe(MarketplaceErrorCode.ReentrantCall);
    expect(hook.balanceOf(f.seller)).toBe(99n);
    expect(f.nft.ownerOf(2n)).toBe(f.seller);
  });

  it('reverts a sale to a contract that cannot take the token', () => {
    const buyer = new PlainContract(f.chain);
    f.chain.setBalance(buyer.address, 100n);
    const view = list(f.seller, 1n);

    const err = captureError(() =>
      f.market.listings
        .connect(buyer.address, { value: 100n })
        .purchaseListing(purchaseParams(view)),
    );

    expect(err).toMatchObject({ code: ChainErrorCode.InvalidReceiver });
    expect(f.chain.balanceOf(buyer.address)).toBe(100n);
    expect(f.nft.ownerOf(1n)).toBe(f.seller);
    expect(f.market.guard.locked).toBe(false);
  });
});
