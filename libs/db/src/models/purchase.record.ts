import { prop, index, DocumentType } from '@typegoose/typegoose';

import { BaseModel } from './model';

export type IPurchaseRecord = DocumentType<PurchaseRecord>;

@index({ blockNumber: 1, logIndex: 1 }, { unique: true })
export class PurchaseRecord extends BaseModel {
  @prop({ type: Number, required: true, index: true })
  listingId!: number;

  @prop({ type: Number, required: true })
  blockNumber!: number;

  @prop({ type: Number, required: true })
  logIndex!: number;

  @prop({ type: String, required: true, index: true })
  buyer!: string;

  @prop({ type: String, required: true, index: true })
  seller!: string;

  @prop({ type: String, required: true })
  tokenAddress!: string;

  @prop({ type: String, required: true })
  tokenId!: string;

  @prop({ type: String, required: true })
  erc1155Quantity!: string;

  @prop({ type: String, required: true })
  currency!: string;

  @prop({ type: String, required: true })
  price!: string;

  @prop({ type: String, required: true })
  fee!: string;

  @prop({ type: String })
  royaltyReceiver?: string;

  @prop({ type: String, required: true })
  royaltyAmount!: string;

  @prop({ type: String, required: true })
  sellerProceeds!: string;
}
