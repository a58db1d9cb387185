/**
 * Balance, approval and transfer capability over one asset at a time,
 * shaped after an ERC-20 token. Every address is checksummed.
 */
export interface CurrencyPort {
  balanceOf(asset: string, account: string): Promise<bigint>;
  allowance(asset: string, owner: string, spender: string): Promise<bigint>;
  transfer(asset: string, from: string, to: string, amount: bigint): Promise<void>;
  /** Moves `amount` from `from` to `to`, spending the approval `from` gave `spender` */
  transferFrom(asset: string, spender: string, from: string, to: string, amount: bigint): Promise<void>;
}

export const CURRENCY_PORT = 'CURRENCY_PORT';
