export enum ChainErrorCode {
  InsufficientFunds = 'InsufficientFunds',
  NoActiveCall = 'NoActiveCall',
  NonPayable = 'NonPayable',
  InvalidAmount = 'InvalidAmount',
  ZeroAddress = 'ZeroAddress',
  NonexistentToken = 'NonexistentToken',
  TokenAlreadyMinted = 'TokenAlreadyMinted',
  NotTokenOwner = 'NotTokenOwner',
  NotApproved = 'NotApproved',
  InsufficientBalance = 'InsufficientBalance',
  InsufficientAllowance = 'InsufficientAllowance',
  InvalidReceiver = 'InvalidReceiver',
}

/** A revert raised by the execution environment or a token contract. */
export class ChainError extends Error {
  readonly code: ChainErrorCode;

  constructor(code: ChainErrorCode, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = 'ChainError';
    this.code = code;
  }
}
