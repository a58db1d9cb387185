import { BundleTier } from '../../domain/bundle';
import { PayoutShare, RaffleEventName, RaffleStatus } from '../../domain/raffle.entity';

// Amounts are decimal strings of base units

export interface BundleResponseDto {
  tier: BundleTier;
  amount: string;
  price: string;
}

export interface DistributionResponseDto {
  prize: string;
  donation: string;
  commission: string;
}

export interface RaffleResponseDto {
  id: string;
  address: string;
  owner: string;
  currency: string; // "native" or the token address
  decimals: number;
  ticketPrice: string;
  bundles: BundleResponseDto[];
  fixedPrize?: string;
  donationPercent: number;
  raffleEndDate: string;
  pot: string;
  status: RaffleStatus;
  winner?: string;
  donationAddress?: string;
  distribution?: DistributionResponseDto;
  settledAt?: string;
  paidShares: PayoutShare[];
  createdAt: string;
  updatedAt: string;
}

export interface PurchaseResponseDto {
  tier?: BundleTier; // absent for free tickets
  ticketsGranted: string;
  paid: string;
  totalTickets: string;
  referral?: string;
}

export interface PlayerResponseDto {
  address: string;
  tickets: string;
}

export interface SettlementResponseDto {
  winner: string;
  donationAddress: string;
  distribution: DistributionResponseDto;
  paidShares: PayoutShare[]; // shares that have left the raffle account
}

export interface RaffleEventResponseDto {
  name: RaffleEventName;
  height: number;
  at: string;
  args: Record<string, string>;
}
