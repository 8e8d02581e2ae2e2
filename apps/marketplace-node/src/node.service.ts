import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { Chain, Erc1155, Erc721 } from '@Bazaar/chain';
import { SeedCfg, SeedCollectionCfg, parseSeedCfg } from '@Bazaar/config';
import { MarketplaceDiamond } from '@Bazaar/diamond';
import {
  Address,
  CreateListingParams,
  ListingView,
  MarketplaceError,
  MarketplaceErrorCode,
  Network,
  PurchaseListingParams,
  TokenStandard,
  UpdateListingParams,
} from '@Bazaar/type';

export type SeededCollection = {
  name: string;
  standard: TokenStandard;
  address: Address;
};

/**
 * Hosts the marketplace for the indexer, the sweeper and the HTTP API in
 * one process, and signs transactions for account labels the way a local
 * development node unlocks its accounts.
 */
@Injectable()
export class NodeService implements OnModuleInit {
  private readonly logger = new Logger(NodeService.name);

  readonly collections: SeededCollection[] = [];

  constructor(
    private readonly configService: ConfigService,
    private readonly chain: Chain,
    private readonly market: MarketplaceDiamond,
  ) {}

  onModuleInit() {
    const network = this.configService.get<Network>('network') ?? 'devnet';
    this.seed(parseSeedCfg(this.configService.get(`${network}.seed`)));
  }

  seed(cfg: SeedCfg) {
    for (const [account, amount] of Object.entries(cfg.balances)) {
      this.chain.setBalance(this.account(account), BigInt(amount));
    }
    for (const collection of cfg.collections) {
      this.collections.push(this.deployCollection(collection));
    }
    if (cfg.collections.length > 0) {
      this.logger.log(
        `Seeded ${this.collections
          .map((c) => `${c.name} (${c.address})`)
          .join(', ')}`,
      );
    }
  }

  account(nameOrAddress: string): Address {
    return this.chain.resolveAccount(nameOrAddress);
  }

  listing(listingId: number): ListingView {
    const listing = this.market.getters.getListing(listingId);
    if (!listing) {
      throw new MarketplaceError(
        MarketplaceErrorCode.ListingNotFound,
        `listing ${listingId}`,
      );
    }
    return listing;
  }

  createListing(from: string, params: CreateListingParams) {
    return this.market.listings
      .connect(this.account(from))
      .createListing(params);
  }

  purchaseListing(from: string, value: bigint, params: PurchaseListingParams) {
    return this.market.listings
      .connect(this.account(from), { value })
      .purchaseListing(params);
  }

  updateListing(from: string, params: UpdateListingParams) {
    return this.market.listings
      .connect(this.account(from))
      .updateListing(params);
  }

  cancelListing(from: string, listingId: number) {
    this.market.listings.connect(this.account(from)).cancelListing(listingId);
  }

  cleanListing(from: string, listingId: number) {
    return this.market.listings
      .connect(this.account(from))
      .cleanListing(listingId);
  }

  private deployCollection(cfg: SeedCollectionCfg): SeededCollection {
    const royalty = cfg.royalty && {
      receiver: this.account(cfg.royalty.receiver),
      basisPoints: BigInt(cfg.royalty.basisPoints),
    };
    const holders = new Set<Address>();
    let address: Address;
    let approve: (holder: Address) => void;

    if (cfg.standard === 'ERC721') {
      const token = new Erc721(this.chain, cfg.name, { royalty });
      for (const mint of cfg.mints) {
        holders.add(this.account(mint.to));
        token.mint(this.account(mint.to), BigInt(mint.tokenId));
      }
      address = token.address;
      approve = (holder) =>
        token.connect(holder).setApprovalForAll(this.market.address, true);
    } else {
      const token = new Erc1155(this.chain, cfg.name, { royalty });
      for (const mint of cfg.mints) {
        holders.add(this.account(mint.to));
        token.mint(
          this.account(mint.to),
          BigInt(mint.tokenId),
          BigInt(mint.amount ?? '1'),
        );
      }
      address = token.address;
      approve = (holder) =>
        token.connect(holder).setApprovalForAll(this.market.address, true);
    }

    this.market.collections
      .connect(this.market.admin.owner())
      .addWhitelistedCollection(address);
    holders.forEach(approve);
    return {
      name: cfg.name,
      standard:
        cfg.standard === 'ERC721'
          ? TokenStandard.ERC721
          : TokenStandard.ERC1155,
      address,
    };
  }
}
