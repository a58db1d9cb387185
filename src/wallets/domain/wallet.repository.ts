export interface IWalletRepository {
  getBalance(asset: string, account: string): Promise<bigint>;
  credit(asset: string, account: string, amount: bigint): Promise<void>;
  /** Resolves false, changing nothing, when the balance is below `amount` */
  debit(asset: string, account: string, amount: bigint): Promise<boolean>;
  getAllowance(asset: string, owner: string, spender: string): Promise<bigint>;
  setAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<void>;
  /** Resolves false, changing nothing, when the allowance is below `amount` */
  spendAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<boolean>;
  restoreAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<void>;
}

export const WALLET_REPOSITORY = 'WALLET_REPOSITORY';
