import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Put,
} from '@nestjs/common';
import { ApiParam, ApiTags } from '@nestjs/swagger';

import { toPlain } from '@Bazaar/common';

import { NodeService } from './node.service';
import {
  TransactionBody,
  createListingParams,
  purchaseListingParams,
  updateListingParams,
} from './transaction.body';

/**
 * Sends marketplace transactions from unlocked development accounts. The
 * body names the sender in `from`, as a label or an address.
 */
@Controller('/tx')
@ApiTags('Transactions')
export class TransactionsController {
  constructor(private readonly nodeService: NodeService) {}

  @Get('/collections')
  getCollections() {
    return this.nodeService.collections;
  }

  @Post('/listings')
  createListing(@Body() raw: unknown) {
    const body = TransactionBody.from(raw);
    const listingId = this.nodeService.createListing(
      body.sender(),
      createListingParams(body),
    );
    return { listingId };
  }

  @Put('/listings/:listingId')
  @ApiParam({ type: Number, name: 'listingId' })
  updateListing(
    @Param('listingId', ParseIntPipe) listingId: number,
    @Body() raw: unknown,
  ) {
    const body = TransactionBody.from(raw);
    const current = this.nodeService.listing(listingId);
    return toPlain(
      this.nodeService.updateListing(
        body.sender(),
        updateListingParams(body, current),
      ),
    );
  }

  @Post('/listings/:listingId/purchase')
  @ApiParam({ type: Number, name: 'listingId' })
  purchaseListing(
    @Param('listingId', ParseIntPipe) listingId: number,
    @Body() raw: unknown,
  ) {
    const body = TransactionBody.from(raw);
    return toPlain(
      this.nodeService.purchaseListing(
        body.sender(),
        body.bigint('value', 0n),
        purchaseListingParams(body, listingId),
      ),
    );
  }

  @Post('/listings/:listingId/cancel')
  @HttpCode(204)
  @ApiParam({ type: Number, name: 'listingId' })
  cancelListing(
    @Param('listingId', ParseIntPipe) listingId: number,
    @Body() raw: unknown,
  ) {
    this.nodeService.cancelListing(
      TransactionBody.from(raw).sender(),
      listingId,
    );
  }

  @Post('/listings/:listingId/clean')
  @ApiParam({ type: Number, name: 'listingId' })
  cleanListing(
    @Param('listingId', ParseIntPipe) listingId: number,
    @Body() raw: unknown,
  ) {
    const reason = this.nodeService.cleanListing(
      TransactionBody.from(raw).sender(),
      listingId,
    );
    return { listingId, reason };
  }
}
