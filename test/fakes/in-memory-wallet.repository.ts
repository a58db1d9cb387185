import { IWalletRepository } from '../../src/wallets/domain/wallet.repository';

export class InMemoryWalletRepository implements IWalletRepository {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();

  async getBalance(asset: string, account: string): Promise<bigint> {
    return this.balances.get(`${asset}/${account}`) ?? 0n;
  }

  async credit(asset: string, account: string, amount: bigint): Promise<void> {
    const key = `${asset}/${account}`;
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  async debit(asset: string, account: string, amount: bigint): Promise<boolean> {
    const key = `${asset}/${account}`;
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) return false;
    this.balances.set(key, balance - amount);
    return true;
  }

  async getAllowance(asset: string, owner: string, spender: string): Promise<bigint> {
    return this.allowances.get(`${asset}/${owner}/${spender}`) ?? 0n;
  }

  async setAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<void> {
    this.allowances.set(`${asset}/${owner}/${spender}`, amount);
  }

  async spendAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<boolean> {
    const key = `${asset}/${owner}/${spender}`;
    const allowance = this.allowances.get(key) ?? 0n;
    if (allowance < amount) return false;
    this.allowances.set(key, allowance - amount);
    return true;
  }

  async restoreAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<void> {
    const key = `${asset}/${owner}/${spender}`;
    this.allowances.set(key, (this.allowances.get(key) ?? 0n) + amount);
  }
}
