import {
  Controller,
  DefaultValuePipe,
  Get,
  Param,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { ApiParam, ApiQuery, ApiTags } from '@nestjs/swagger';

import { ParseAddressPipe, ParseBigIntPipe, toPlain } from '@Bazaar/common';
import { Address } from '@Bazaar/type';

import { WebApiService } from './web-api.service';

@Controller('/marketplace')
@ApiTags('Marketplace')
export class MarketplaceController {
  constructor(private readonly webApiService: WebApiService) {}

  @Get()
  getMarketplace() {
    return toPlain(this.webApiService.getMarketplace());
  }
}

@Controller('/listings')
@ApiTags('Listings')
export class ListingsController {
  constructor(private readonly webApiService: WebApiService) {}

  @Get()
  @ApiQuery({ type: String, name: 'status', required: false })
  @ApiQuery({ type: String, name: 'seller', required: false })
  @ApiQuery({ type: String, name: 'tokenAddress', required: false })
  @ApiQuery({ type: Number, name: 'page', required: false })
  @ApiQuery({ type: Number, name: 'limit', required: false })
  async getListingHistory(
    @Query('page', new DefaultValuePipe(1), ParseIntPipe) page: number,
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
    @Query('status') status?: string,
    @Query('seller', new ParseAddressPipe({ optional: true }))
    seller?: Address,
    @Query('tokenAddress', new ParseAddressPipe({ optional: true }))
    tokenAddress?: Address,
  ) {
    return this.webApiService.getListingHistory(
      { status, seller, tokenAddress },
      page,
      limit,
    );
  }

  @Get('/:listingId')
  @ApiParam({ type: Number, name: 'listingId' })
  getListing(@Param('listingId', ParseIntPipe) listingId: number) {
    return toPlain(this.webApiService.getListing(listingId));
  }

  @Get('/:listingId/purchases')
  @ApiParam({ type: Number, name: 'listingId' })
  @ApiQuery({ type: Number, name: 'page', required: false })
  @ApiQuery({ type: Number, name: 'limit', required: false })
  async getPurchases(
    @Param('listingId', ParseIntPipe) listingId: number,
    @Query('page', new DefaultValuePipe(1), ParseIntPipe) page: number,
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ) {
    return this.webApiService.getPurchases({ listingId }, page, limit);
  }
}

@Controller('/stale-listings')
@ApiTags('StaleListings')
export class StaleListingsController {
  constructor(private readonly webApiService: WebApiService) {}

  @Get()
  getStaleListings() {
    return this.webApiService.getStaleListings();
  }
}

@Controller('/tokens')
@ApiTags('Tokens')
export class TokensController {
  constructor(private readonly webApiService: WebApiService) {}

  @Get('/:tokenAddress/:tokenId/listings')
  @ApiParam({ type: String, name: 'tokenAddress' })
  @ApiParam({ type: String, name: 'tokenId' })
  getListingIdsByToken(
    @Param('tokenAddress', new ParseAddressPipe()) tokenAddress: Address,
    @Param('tokenId', ParseBigIntPipe) tokenId: bigint,
  ) {
    return this.webApiService.getListingIdsByToken(tokenAddress, tokenId);
  }
}

export const CONTROLLERS = [
  MarketplaceController,
  ListingsController,
  StaleListingsController,
  TokensController,
];
