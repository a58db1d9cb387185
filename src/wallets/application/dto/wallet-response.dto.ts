export interface BalanceResponseDto {
  asset: string;
  account: string;
  balance: string;
}

export interface AllowanceResponseDto {
  asset: string;
  owner: string;
  spender: string;
  amount: string;
}
