import { toChecksumAddress } from '../../common/address';
import { Bundle, BundleTier, buildBundles } from './bundle';
import { EntropySource } from './entropy';
import { RaffleError, RaffleErrorCode } from './raffle.errors';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export enum RaffleStatus {
  OPEN = 'open',       // accepting purchases
  CLOSED = 'closed',   // past the end date, waiting for the owner to settle
  SETTLED = 'settled', // winner picked and pot distributed
}

export type RaffleCurrency = { kind: 'native' } | { kind: 'token'; token: string };

/**
 * What the caller brings to a purchase. Native payments carry the attached
 * value; token payments carry the caller's balance and approval toward the
 * raffle account, read just before the call.
 */
export type Payment =
  | { medium: 'native'; value: bigint }
  | { medium: 'token'; balance: bigint; allowance: bigint };

export interface PurchaseReceipt {
  tier: BundleTier;
  tickets: bigint;
  charge: bigint; // amount to move from the buyer into the raffle account
}

export interface PrizeDistribution {
  prize: bigint;
  donation: bigint;
  commission: bigint;
}

export type PayoutShare = keyof PrizeDistribution;

export interface Payout {
  share: PayoutShare;
  recipient: string;
  amount: bigint;
}

export interface Settlement {
  winner: string;
  distribution: PrizeDistribution;
  payouts: Payout[];
}

export type RaffleEventName = 'TicketsPurchased' | 'FreeTicketClaimed' | 'Referred' | 'WinnerPicked';

export interface RaffleEvent {
  name: RaffleEventName;
  height: number;
  at: Date;
  args: Record<string, string>;
}

export interface IRaffle {
  id?: string;
  address: string;
  owner: string;
  currency: RaffleCurrency;
  decimals: number;
  ticketPrice: bigint;
  bundles: Bundle[];
  fixedPrize?: bigint;
  donationPercent: number;
  raffleEndDate: Date;
  pot: bigint;
  tickets: Map<string, bigint>; // insertion-ordered player set with ticket counts
  winner?: string;
  donationAddress?: string;
  distribution?: PrizeDistribution;
  settledAt?: Date;
  paidShares: PayoutShare[]; // shares already moved out of the raffle account
  height: number;
  revision: number; // bumped by every successful save
  events: RaffleEvent[];
  createdAt: Date;
  updatedAt: Date;
}

export interface OpenRaffleParams {
  address: string;
  owner: string;
  currency: RaffleCurrency;
  decimals: number;
  ticketPrice: bigint;
  durationDays: number;
  fixedPrize?: bigint;
  donationPercent: number;
  openingBalance?: bigint; // value already held at the address before it opens
}

export class Raffle implements IRaffle {
  id?: string;
  readonly address: string;
  readonly owner: string;
  readonly currency: RaffleCurrency;
  readonly decimals: number;
  readonly ticketPrice: bigint;
  readonly bundles: Bundle[];
  readonly fixedPrize?: bigint;
  readonly donationPercent: number;
  readonly raffleEndDate: Date;
  pot: bigint;
  tickets: Map<string, bigint>;
  winner?: string;
  donationAddress?: string;
  distribution?: PrizeDistribution;
  settledAt?: Date;
  paidShares: PayoutShare[];
  height: number;
  revision: number;
  events: RaffleEvent[];
  readonly createdAt: Date;
  updatedAt: Date;

  constructor(props: IRaffle) {
    this.id = props.id;
    this.address = props.address;
    this.owner = props.owner;
    this.currency = props.currency;
    this.decimals = props.decimals;
    this.ticketPrice = props.ticketPrice;
    this.bundles = props.bundles.map((bundle) => ({ ...bundle }));
    this.fixedPrize = props.fixedPrize;
    this.donationPercent = props.donationPercent;
    this.raffleEndDate = props.raffleEndDate;
    this.pot = props.pot;
    this.tickets = new Map(props.tickets);
    this.winner = props.winner;
    this.donationAddress = props.donationAddress;
    this.distribution = props.distribution ? { ...props.distribution } : undefined;
    this.settledAt = props.settledAt;
    this.paidShares = [...props.paidShares];
    this.height = props.height;
    this.revision = props.revision;
    this.events = props.events.map((event) => ({ ...event, args: { ...event.args } }));
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  /**
   * Create a fresh ledger closing `durationDays` days after `now`
   */
  static open(params: OpenRaffleParams, now: Date): Raffle {
    if (!Number.isInteger(params.durationDays) || params.durationDays < 1) {
      throw new RaffleError(
        RaffleErrorCode.INVALID_TIMESTAMP,
        'Future timestamp must be at least 1 day',
      );
    }
    const raffleEndDate = new Date(now.getTime() + params.durationDays * MS_PER_DAY);
    if (raffleEndDate.getTime() <= now.getTime()) {
      throw new RaffleError(RaffleErrorCode.INVALID_TIMESTAMP, 'End date must be in the future');
    }
    if (params.ticketPrice <= 0n) {
      throw new RaffleError(RaffleErrorCode.INVALID_PURCHASE, 'Ticket price must be greater than zero');
    }
    if (params.fixedPrize !== undefined && params.fixedPrize <= 0n) {
      throw new RaffleError(RaffleErrorCode.INVALID_PURCHASE, 'Fixed prize must be greater than zero');
    }
    if (
      !Number.isInteger(params.donationPercent) ||
      params.donationPercent < 1 ||
      params.donationPercent > 99
    ) {
      throw new RaffleError(
        RaffleErrorCode.INVALID_PURCHASE,
        'Donation percent must be an integer between 1 and 99',
      );
    }

    return new Raffle({
      address: params.address,
      owner: params.owner,
      currency: params.currency,
      decimals: params.decimals,
      ticketPrice: params.ticketPrice,
      bundles: buildBundles(params.ticketPrice),
      fixedPrize: params.fixedPrize,
      donationPercent: params.donationPercent,
      raffleEndDate,
      pot: params.openingBalance ?? 0n,
      tickets: new Map(),
      paidShares: [],
      height: 0,
      revision: 0,
      events: [],
      createdAt: now,
      updatedAt: now,
    });
  }

  clone(): Raffle {
    return new Raffle(this);
  }

  get isSettled(): boolean {
    return this.winner !== undefined;
  }

  status(now: Date): RaffleStatus {
    if (this.isSettled) return RaffleStatus.SETTLED;
    return this.isOpen(now) ? RaffleStatus.OPEN : RaffleStatus.CLOSED;
  }

  isOpen(now: Date): boolean {
    return now.getTime() < this.raffleEndDate.getTime();
  }

  getBundles(): Bundle[] {
    return this.bundles.map((bundle) => ({ ...bundle }));
  }

  ticketsOf(address: string): bigint {
    const normalized = toChecksumAddress(address);
    if (!normalized) return 0n;
    return this.tickets.get(normalized) ?? 0n;
  }

  soldTickets(): bigint {
    let total = 0n;
    for (const count of this.tickets.values()) {
      total += count;
    }
    return total;
  }

  listSoldTickets(caller: string): bigint {
    this.assertOwner(caller);
    return this.soldTickets();
  }

  listPlayers(caller: string): Array<{ address: string; tickets: bigint }> {
    this.assertOwner(caller);
    return [...this.tickets.entries()].map(([address, tickets]) => ({ address, tickets }));
  }

  /**
   * Half of the pot, capped at the fixed prize when one is set
   */
  prizePool(): bigint {
    const half = this.pot / 2n;
    if (this.fixedPrize !== undefined && this.fixedPrize < half) {
      return this.fixedPrize;
    }
    return half;
  }

  donationAmount(): bigint {
    return ((this.pot - this.prizePool()) * BigInt(this.donationPercent)) / 100n;
  }

  commissionAmount(): bigint {
    return this.pot - this.prizePool() - this.donationAmount();
  }

  prizeDistribution(): PrizeDistribution {
    const prize = this.prizePool();
    const donation = ((this.pot - prize) * BigInt(this.donationPercent)) / 100n;
    // Rounding remainders always land in the commission
    return { prize, donation, commission: this.pot - prize - donation };
  }

  buyBundle(
    caller: string,
    tier: BundleTier,
    payment: Payment,
    now: Date,
    referral?: string,
  ): PurchaseReceipt {
    this.assertOpen(now);
    this.assertNotOwner(caller);
    const bundle = this.findBundle(tier);
    const referred = referral === undefined ? undefined : this.checkReferral(caller, referral);
    const charge = this.chargeFor(bundle, payment);

    this.advance(now);
    this.recordPurchase(caller, bundle, charge, now);
    if (referred) {
      this.grant(referred, 1n);
      this.record('Referred', { referral: referred }, now);
    }

    return { tier: bundle.tier, tickets: bundle.amount, charge };
  }

  /**
   * Value sent without choosing a bundle buys the largest tier it covers.
   * Any excess over that tier's price stays in the pot.
   */
  receivePayment(caller: string, value: bigint, now: Date): PurchaseReceipt {
    this.assertOpen(now);
    this.assertNotOwner(caller);
    if (this.currency.kind !== 'native') {
      throw new RaffleError(
        RaffleErrorCode.INVALID_PURCHASE,
        'Direct payments are only accepted in the native currency',
      );
    }

    const bundle = [...this.bundles]
      .sort((a, b) => (a.price > b.price ? -1 : a.price < b.price ? 1 : 0))
      .find((candidate) => value >= candidate.price);
    if (!bundle) {
      throw new RaffleError(RaffleErrorCode.INSUFFICIENT_FUNDS, 'Incorrect payment amount', {
        value: value.toString(),
      });
    }

    this.advance(now);
    this.recordPurchase(caller, bundle, value, now);
    return { tier: bundle.tier, tickets: bundle.amount, charge: value };
  }

  claimFreeTicket(caller: string, now: Date): bigint {
    this.assertOpen(now);
    this.assertNotOwner(caller);
    if (this.ticketsOf(caller) > 0n) {
      throw new RaffleError(RaffleErrorCode.ALREADY_CLAIMED, 'User already owns tickets');
    }

    this.advance(now);
    this.grant(caller, 1n);
    this.record('FreeTicketClaimed', { player: caller }, now);
    return 1n;
  }

  /**
   * Pick the winner and fix the split of the pot. The ledger is settled once
   * this returns; moving the funds is left to the caller.
   */
  finish(caller: string, donationAddress: string, now: Date, entropy: EntropySource): Settlement {
    this.assertOwner(caller);
    if (this.isSettled) {
      throw new RaffleError(RaffleErrorCode.ALREADY_SETTLED, 'A winner has already been selected');
    }
    if (this.isOpen(now)) {
      throw new RaffleError(
        RaffleErrorCode.RAFFLE_NOT_YET_FINISHED,
        'End date has not being reached yet',
      );
    }
    const donationTo = toChecksumAddress(donationAddress);
    if (!donationTo) {
      throw new RaffleError(RaffleErrorCode.INVALID_ADDRESS, `${donationAddress} is not a valid address`);
    }
    if (this.pot === 0n) {
      throw new RaffleError(RaffleErrorCode.EMPTY_POT, 'The pot is empty. Raffle is invalid');
    }

    const winner = this.pickWinner(entropy, now);
    const distribution = this.prizeDistribution();

    this.advance(now);
    this.winner = winner;
    this.donationAddress = donationTo;
    this.distribution = distribution;
    this.settledAt = now;
    this.record('WinnerPicked', { winner }, now);

    return { winner, distribution: { ...distribution }, payouts: this.pendingPayouts() };
  }

  /**
   * Shares of a settled pot that have not left the raffle account yet, in
   * payout order: prize, donation, commission.
   */
  pendingPayouts(): Payout[] {
    const { winner, donationAddress, distribution } = this;
    if (winner === undefined || donationAddress === undefined || distribution === undefined) {
      return [];
    }
    const payouts: Payout[] = [
      { share: 'prize', recipient: winner, amount: distribution.prize },
      { share: 'donation', recipient: donationAddress, amount: distribution.donation },
      { share: 'commission', recipient: this.owner, amount: distribution.commission },
    ];
    return payouts.filter((payout) => !this.paidShares.includes(payout.share));
  }

  /**
   * Owner view of the payouts still owed by a settled raffle
   */
  outstandingPayouts(caller: string): Payout[] {
    this.assertOwner(caller);
    if (!this.isSettled) {
      throw new RaffleError(RaffleErrorCode.NOT_SETTLED, 'No winner has been selected yet');
    }
    return this.pendingPayouts();
  }

  /**
   * The pot keeps tracking what the raffle account holds while shares are paid out
   */
  recordPayout(payout: Payout, now: Date): void {
    if (this.paidShares.includes(payout.share)) {
      throw new Error(`The ${payout.share} of ${this.address} was already paid`);
    }
    this.pot -= payout.amount;
    this.paidShares.push(payout.share);
    this.updatedAt = now;
  }

  /**
   * Undo recordPayout once the share has been returned to the raffle account
   */
  reversePayout(payout: Payout, now: Date): void {
    if (!this.paidShares.includes(payout.share)) {
      throw new Error(`The ${payout.share} of ${this.address} was not paid`);
    }
    this.pot += payout.amount;
    this.paidShares = this.paidShares.filter((share) => share !== payout.share);
    this.updatedAt = now;
  }

  /**
   * Weighted draw: each player owns a run of slots as long as their ticket
   * count, laid out in insertion order, and R in [0, T) lands in one of them.
   */
  private pickWinner(entropy: EntropySource, now: Date): string {
    const total = this.soldTickets();
    if (total === 0n) {
      throw new RaffleError(RaffleErrorCode.NO_PARTICIPANTS, 'No tickets have been issued');
    }

    const random = entropy.nextRandom({ timestamp: now, height: this.height, raffle: this.address });
    const target = ((random % total) + total) % total;

    let cumulative = 0n;
    for (const [player, count] of this.tickets) {
      cumulative += count;
      if (cumulative > target) {
        return player;
      }
    }

    throw new Error(`Weighted scan found no winner for ${target} of ${total} tickets`);
  }

  private findBundle(tier: BundleTier): Bundle {
    const bundle = this.bundles.find((candidate) => candidate.tier === tier);
    if (!bundle || bundle.amount === 0n || bundle.price === 0n) {
      throw new RaffleError(RaffleErrorCode.INVALID_PURCHASE, `Unknown bundle ${tier}`);
    }
    return bundle;
  }

  private checkReferral(caller: string, referral: string): string {
    const target = toChecksumAddress(referral);
    if (!target) {
      throw new RaffleError(RaffleErrorCode.INVALID_ADDRESS, `${referral} is not a valid address`);
    }
    if (target === caller) {
      throw new RaffleError(RaffleErrorCode.SELF_REFERRAL, 'User can not refer themselves');
    }
    if (this.ticketsOf(target) === 0n) {
      throw new RaffleError(RaffleErrorCode.NOT_A_PLAYER, 'Can only refer a user who owns a ticket');
    }
    return target;
  }

  private chargeFor(bundle: Bundle, payment: Payment): bigint {
    if (payment.medium !== this.currency.kind) {
      throw new RaffleError(
        RaffleErrorCode.INVALID_PURCHASE,
        `This raffle is paid in ${this.currency.kind === 'native' ? 'the native currency' : 'tokens'}`,
      );
    }

    if (payment.medium === 'native') {
      if (payment.value < bundle.price) {
        throw new RaffleError(RaffleErrorCode.INSUFFICIENT_FUNDS, 'Insufficient funds', {
          required: bundle.price.toString(),
          provided: payment.value.toString(),
        });
      }
      return payment.value;
    }

    if (payment.balance < bundle.price) {
      throw new RaffleError(RaffleErrorCode.INSUFFICIENT_FUNDS, 'Insufficient funds', {
        required: bundle.price.toString(),
        provided: payment.balance.toString(),
      });
    }
    if (payment.allowance < bundle.price) {
      throw new RaffleError(RaffleErrorCode.INSUFFICIENT_ALLOWANCE, 'Insufficient allowance', {
        required: bundle.price.toString(),
        provided: payment.allowance.toString(),
      });
    }
    return bundle.price;
  }

  private recordPurchase(caller: string, bundle: Bundle, charge: bigint, now: Date): void {
    this.grant(caller, bundle.amount);
    this.pot += charge;
    this.record(
      'TicketsPurchased',
      {
        player: caller,
        tier: bundle.tier,
        tickets: bundle.amount.toString(),
        paid: charge.toString(),
      },
      now,
    );
  }

  private grant(player: string, amount: bigint): void {
    this.tickets.set(player, (this.tickets.get(player) ?? 0n) + amount);
  }

  private advance(now: Date): void {
    this.height += 1;
    this.updatedAt = now;
  }

  private record(name: RaffleEventName, args: Record<string, string>, now: Date): void {
    this.events.push({ name, height: this.height, at: now, args });
  }

  private assertOpen(now: Date): void {
    if (!this.isOpen(now)) {
      throw new RaffleError(RaffleErrorCode.RAFFLE_CLOSED, 'Raffle is over');
    }
  }

  private assertOwner(caller: string): void {
    if (caller !== this.owner) {
      throw new RaffleError(RaffleErrorCode.NOT_OWNER, 'Invoker must be the owner');
    }
  }

  private assertNotOwner(caller: string): void {
    if (caller === this.owner) {
      throw new RaffleError(
        RaffleErrorCode.OWNER_EXCLUDED,
        'Owner cannot participate in the Raffle',
      );
    }
  }
}
