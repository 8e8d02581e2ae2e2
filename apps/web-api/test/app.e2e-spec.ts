import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';

import { Chain, Erc721 } from '@Bazaar/chain';
import { HttpExceptionFilter } from '@Bazaar/common';
import { ConfigModule } from '@Bazaar/config';
import { InMemoryStore, ListingStatus, MarketplaceStore } from '@Bazaar/db';
import { MarketplaceDiamond, MarketplaceModule } from '@Bazaar/diamond';
import { NATIVE_CURRENCY, ZERO_ADDRESS } from '@Bazaar/type';

import { CONTROLLERS } from '../src/web-api.controller';
import { WebApiService } from '../src/web-api.service';

describe('WebApi (e2e)', () => {
  let app: INestApplication;
  let store: InMemoryStore;
  let chain: Chain;
  let market: MarketplaceDiamond;
  let nft: Erc721;
  let seller: string;

  function list(tokenId: bigint) {
    return market.listings.connect(seller).createListing({
      tokenAddress: nft.address,
      tokenId,
      erc1155Holder: ZERO_ADDRESS,
      price: 100n,
      currency: NATIVE_CURRENCY,
      desiredTokenAddress: ZERO_ADDRESS,
      desiredTokenId: 0n,
      desiredErc1155Quantity: 0n,
      erc1155Quantity: 0n,
      buyerWhitelistEnabled: false,
      partialBuyEnabled: false,
      allowedBuyers: [],
    });
  }

  beforeEach(async () => {
    store = new InMemoryStore();
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [ConfigModule, MarketplaceModule],
      controllers: CONTROLLERS,
      providers: [
        WebApiService,
        { provide: MarketplaceStore, useValue: store },
      ],
    }).compile();

    app = moduleFixture.createNestApplication(undefined, {
      logger: false,
    });
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();

    chain = app.get(Chain);
    market = app.get(MarketplaceDiamond);
    seller = chain.createAccount('seller');
    nft = new Erc721(chain, 'Lanterns');
    market.collections
      .connect(chain.resolveAccount('owner'))
      .addWhitelistedCollection(nft.address);
    nft.mint(seller, 1n);
    nft.mint(seller, 2n);
    nft.connect(seller).setApprovalForAll(market.address, true);
    list(1n);
    list(2n);
    nft
      .connect(seller)
      .transferFrom(seller, chain.createAccount('someone'), 2n);
  });

  afterEach(async () => {
    await app.close();
  });

  it('/marketplace (GET)', async () => {
    const res = await request(app.getHttpServer())
      .get('/marketplace')
      .expect(200);

    expect(res.body).toMatchObject({
      address: market.address,
      owner: chain.resolveAccount('owner'),
      paused: false,
      feeRate: '2500',
      feeRecipient: chain.resolveAccount('fee-recipient'),
      allowedCurrencies: [NATIVE_CURRENCY],
      whitelistedCollections: [nft.address],
      nextListingId: 3,
      activeListings: 2,
    });
  });

  it('/listings/:listingId (GET)', async () => {
    const res = await request(app.getHttpServer())
      .get('/listings/1')
      .expect(200);

    expect(res.body).toEqual({
      listing: {
        listingId: 1,
        feeRate: '2500',
        buyerWhitelistEnabled: false,
        partialBuyEnabled: false,
        tokenAddress: nft.address,
        tokenId: '1',
        erc1155Quantity: '0',
        price: '100',
        seller,
        currency: NATIVE_CURRENCY,
        desiredTokenAddress: ZERO_ADDRESS,
        desiredTokenId: '0',
        desiredErc1155Quantity: '0',
      },
      staleReason: null,
    });
  });

  it('/listings/:listingId (GET) unknown listing', async () => {
    const res = await request(app.getHttpServer())
      .get('/listings/99')
      .expect(404);

    expect(res.body).toEqual({
      statusCode: 404,
      error: 'ListingNotFound',
      message: 'ListingNotFound: listing 99',
    });
  });

  it('/listings/:listingId (GET) malformed id', async () => {
    const res = await request(app.getHttpServer())
      .get('/listings/one')
      .expect(400);

    expect(res.body).toMatchObject({
      statusCode: 400,
      error: 'BadRequestException',
    });
  });

  it('/stale-listings (GET)', async () => {
    await request(app.getHttpServer())
      .get('/stale-listings')
      .expect(200)
      .expect([2]);
  });

  it('/tokens/:tokenAddress/:tokenId/listings (GET)', async () => {
    const server = app.getHttpServer();

    await request(server)
      .get(`/tokens/${nft.address}/1/listings`)
      .expect(200)
      .expect([1]);
    await request(server).get(`/tokens/${nft.address}/-1/listings`).expect(400);
  });

  it('/tokens/:tokenAddress/:tokenId/listings (GET) checksums', async () => {
    const server = app.getHttpServer();

    await request(server)
      .get(`/tokens/${nft.address.toLowerCase()}/1/listings`)
      .expect(200)
      .expect([1]);
    const res = await request(server)
      .get('/tokens/not-an-address/1/listings')
      .expect(400);

    expect(res.body).toEqual({
      statusCode: 400,
      error: 'BadRequestException',
      message: '"not-an-address" is not an address',
    });
  });

  it('/listings (GET) filters by a lowercase seller', async () => {
    const entry = {
      seller,
      tokenAddress: nft.address,
      tokenId: '1',
      standard: 'ERC721',
      erc1155Quantity: '0',
      price: '100',
      currency: NATIVE_CURRENCY,
      desiredTokenAddress: ZERO_ADDRESS,
      desiredTokenId: '0',
      desiredErc1155Quantity: '0',
      feeRate: '2500',
      buyerWhitelistEnabled: false,
      partialBuyEnabled: false,
      createdBlock: 1,
      updatedBlock: 1,
    };
    await store.upsertListing({
      ...entry,
      listingId: 1,
      status: ListingStatus.Active,
    });

    const res = await request(app.getHttpServer())
      .get('/listings')
      .query({ seller: seller.toLowerCase() })
      .expect(200);

    expect(
      res.body.docs.map((doc: { listingId: number }) => doc.listingId),
    ).toEqual([1]);
    await request(app.getHttpServer())
      .get('/listings')
      .query({ seller: '0x12' })
      .expect(400);
  });

  it('/listings (GET) filters the history', async () => {
    const entry = {
      seller,
      tokenAddress: nft.address,
      tokenId: '1',
      standard: 'ERC721',
      erc1155Quantity: '0',
      price: '100',
      currency: NATIVE_CURRENCY,
      desiredTokenAddress: ZERO_ADDRESS,
      desiredTokenId: '0',
      desiredErc1155Quantity: '0',
      feeRate: '2500',
      buyerWhitelistEnabled: false,
      partialBuyEnabled: false,
      createdBlock: 1,
      updatedBlock: 1,
    };
    await store.upsertListing({
      ...entry,
      listingId: 1,
      status: ListingStatus.Active,
    });
    await store.upsertListing({
      ...entry,
      listingId: 2,
      status: ListingStatus.Sold,
    });

    const res = await request(app.getHttpServer())
      .get('/listings')
      .query({ status: 'sold' })
      .expect(200);

    expect(res.body).toMatchObject({ totalDocs: 1, page: 1, limit: 20 });
    expect(res.body.docs).toHaveLength(1);
    expect(res.body.docs[0]).toMatchObject({ listingId: 2, status: 'sold' });
  });

  it('/listings (GET) rejects an unknown status', async () => {
    const res = await request(app.getHttpServer())
      .get('/listings')
      .query({ status: 'bogus' })
      .expect(400);

    expect(res.body).toEqual({
      statusCode: 400,
      error: 'BadRequestException',
      message: 'unknown listing status "bogus"',
    });
  });

  it('/listings/:listingId/purchases (GET)', async () => {
    await store.recordPurchase({
      listingId: 1,
      blockNumber: 9,
      logIndex: 0,
      buyer: chain.createAccount('buyer'),
      seller,
      tokenAddress: nft.address,
      tokenId: '1',
      erc1155Quantity: '0',
      currency: NATIVE_CURRENCY,
      price: '100',
      fee: '2',
      royaltyAmount: '0',
      sellerProceeds: '98',
    });

    const res = await request(app.getHttpServer())
      .get('/listings/1/purchases')
      .query({ limit: 5 })
      .expect(200);

    expect(res.body).toMatchObject({ totalDocs: 1, page: 1, limit: 5 });
    expect(res.body.docs[0]).toMatchObject({
      blockNumber: 9,
      sellerProceeds: '98',
    });
  });
});
