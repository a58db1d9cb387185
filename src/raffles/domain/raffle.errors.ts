export enum RaffleErrorCode {
  // Timing
  RAFFLE_CLOSED = 'RaffleClosed',
  RAFFLE_NOT_YET_FINISHED = 'RaffleNotYetFinished',
  INVALID_TIMESTAMP = 'InvalidTimestamp',
  // Authorization
  NOT_OWNER = 'NotOwner',
  OWNER_EXCLUDED = 'OwnerExcluded',
  // Value
  INSUFFICIENT_FUNDS = 'InsufficientFunds',
  INSUFFICIENT_ALLOWANCE = 'InsufficientAllowance',
  INVALID_PURCHASE = 'InvalidPurchase',
  INVALID_ADDRESS = 'InvalidAddress',
  // State
  ALREADY_CLAIMED = 'AlreadyClaimed',
  ALREADY_SETTLED = 'AlreadySettled',
  EMPTY_POT = 'EmptyPot',
  NO_PARTICIPANTS = 'NoParticipants',
  NOT_SETTLED = 'NotSettled',
  RAFFLE_NOT_FOUND = 'RaffleNotFound',
  CONCURRENT_UPDATE = 'ConcurrentUpdate',
  // Referral
  SELF_REFERRAL = 'SelfReferral',
  NOT_A_PLAYER = 'NotAPlayer',
  // Transfer
  TRANSFER_FAILED = 'TransferFailed',
}

export class RaffleError extends Error {
  constructor(
    readonly code: RaffleErrorCode,
    message: string,
    readonly details?: Record<string, string>,
  ) {
    super(message);
    this.name = 'RaffleError';
  }
}

export class TransferFailedError extends RaffleError {
  constructor(
    readonly amount: bigint,
    readonly recipient: string,
    reason: string,
  ) {
    super(
      RaffleErrorCode.TRANSFER_FAILED,
      `Transfer of ${amount} to ${recipient} failed: ${reason}`,
      { amount: amount.toString(), recipient },
    );
    this.name = 'TransferFailedError';
  }
}
