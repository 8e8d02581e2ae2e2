import { prop, index, DocumentType } from '@typegoose/typegoose';

import { TokenStandard } from '@Bazaar/type';

import { BaseModel } from './model';

export type IListingRecord = DocumentType<ListingRecord>;

export enum ListingStatus {
  Active = 'active',
  Sold = 'sold',
  Cancelled = 'cancelled',
  Cleaned = 'cleaned',
}

// Amounts and token ids are stored as decimal strings.
@index({ tokenAddress: 1, tokenId: 1 })
export class ListingRecord extends BaseModel {
  @prop({ type: Number, required: true, unique: true })
  listingId!: number;

  @prop({ type: String, enum: ListingStatus, required: true, index: true })
  status!: ListingStatus;

  @prop({ type: String, required: true, index: true })
  seller!: string;

  @prop({ type: String, required: true })
  tokenAddress!: string;

  @prop({ type: String, required: true })
  tokenId!: string;

  @prop({ type: String, enum: TokenStandard, required: true })
  standard!: TokenStandard;

  @prop({ type: String, required: true })
  erc1155Quantity!: string;

  @prop({ type: String, required: true })
  price!: string;

  @prop({ type: String, required: true, index: true })
  currency!: string;

  @prop({ type: String, required: true })
  desiredTokenAddress!: string;

  @prop({ type: String, required: true })
  desiredTokenId!: string;

  @prop({ type: String, required: true })
  desiredErc1155Quantity!: string;

  @prop({ type: String, required: true })
  feeRate!: string;

  @prop({ type: Boolean, required: true })
  buyerWhitelistEnabled!: boolean;

  @prop({ type: Boolean, required: true })
  partialBuyEnabled!: boolean;

  @prop({ type: Number, required: true })
  createdBlock!: number;

  @prop({ type: Number, required: true })
  updatedBlock!: number;
}
