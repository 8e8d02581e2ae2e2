export enum MarketplaceErrorCode {
  // authorization
  NotAuthorized = 'NotAuthorized',
  NotContractOwner = 'NotContractOwner',
  MarketplaceNotApproved = 'MarketplaceNotApproved',
  // preconditions
  ListingNotFound = 'ListingNotFound',
  CollectionNotWhitelisted = 'CollectionNotWhitelisted',
  CollectionAlreadyWhitelisted = 'CollectionAlreadyWhitelisted',
  CurrencyNotAllowed = 'CurrencyNotAllowed',
  CurrencyAlreadyAllowed = 'CurrencyAlreadyAllowed',
  BuyerNotWhitelisted = 'BuyerNotWhitelisted',
  BuyerWhitelistNotEnabled = 'BuyerWhitelistNotEnabled',
  BuyerBatchTooLarge = 'BuyerBatchTooLarge',
  WrongQuantityParameter = 'WrongQuantityParameter',
  InvalidUnitPrice = 'InvalidUnitPrice',
  InvalidAmount = 'InvalidAmount',
  InsufficientBalance = 'InsufficientBalance',
  AlreadyListed = 'AlreadyListed',
  FreeListingNotSupported = 'FreeListingNotSupported',
  InvalidNoSwapParameters = 'InvalidNoSwapParameters',
  UnsupportedTokenStandard = 'UnsupportedTokenStandard',
  InvalidAddress = 'InvalidAddress',
  InvalidFeeRate = 'InvalidFeeRate',
  ContractPaused = 'ContractPaused',
  StaleListing = 'StaleListing',
  ListingStillValid = 'ListingStillValid',
  // staleness
  ListingTermsChanged = 'ListingTermsChanged',
  // purchase
  InvalidPurchaseQuantity = 'InvalidPurchaseQuantity',
  PartialBuyNotPossible = 'PartialBuyNotPossible',
  SameBuyerAsSeller = 'SameBuyerAsSeller',
  WrongHolderParameter = 'WrongHolderParameter',
  // payment
  WrongPaymentCurrency = 'WrongPaymentCurrency',
  InsufficientAllowance = 'InsufficientAllowance',
  TokenTransferFailed = 'TokenTransferFailed',
  NativeTransferFailed = 'NativeTransferFailed',
  RoyaltyExceedsProceeds = 'RoyaltyExceedsProceeds',
  // reentrancy
  ReentrantCall = 'ReentrantCall',
}

export class MarketplaceError extends Error {
  readonly code: MarketplaceErrorCode;

  constructor(
    code: MarketplaceErrorCode,
    detail?: string,
    options?: ErrorOptions,
  ) {
    super(detail ? `${code}: ${detail}` : code, options);
    this.name = 'MarketplaceError';
    this.code = code;
  }
}

export function isMarketplaceError(err: unknown): err is MarketplaceError {
  return err instanceof MarketplaceError;
}
