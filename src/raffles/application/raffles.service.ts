import { Inject, Injectable, Logger } from '@nestjs/common';
import { getCreateAddress, parseUnits } from 'ethers';
import { toChecksumAddress } from '../../common/address';
import { Clock, CLOCK } from '../../common/clock';
import { ConfigService } from '../../database/config.service';
import { NATIVE_ASSET, toAsset } from '../../wallets/domain/asset';
import { CURRENCY_PORT, CurrencyPort } from '../../wallets/domain/currency.port';
import { Bundle, isBundleTier } from '../domain/bundle';
import { ENTROPY_SOURCE, EntropySource } from '../domain/entropy';
import {
  Payment,
  Payout,
  PrizeDistribution,
  Raffle,
  RaffleCurrency,
  RaffleStatus,
} from '../domain/raffle.entity';
import { RaffleError, RaffleErrorCode, TransferFailedError } from '../domain/raffle.errors';
import { RAFFLE_LOCK, RaffleLock } from '../domain/raffle-lock';
import { IRaffleRepository, RAFFLE_REPOSITORY } from '../domain/raffle.repository';
import { BuyBundleDto } from './dto/buy-bundle.dto';
import { CreateRaffleDto } from './dto/create-raffle.dto';
import {
  BundleResponseDto,
  DistributionResponseDto,
  PlayerResponseDto,
  PurchaseResponseDto,
  RaffleEventResponseDto,
  RaffleResponseDto,
  SettlementResponseDto,
} from './dto/raffle-response.dto';

const DEFAULT_DECIMALS = 18;

@Injectable()
export class RafflesService {
  private readonly logger = new Logger(RafflesService.name);

  constructor(
    @Inject(RAFFLE_REPOSITORY)
    private readonly raffleRepository: IRaffleRepository,
    @Inject(CURRENCY_PORT)
    private readonly currency: CurrencyPort,
    @Inject(RAFFLE_LOCK)
    private readonly lock: RaffleLock,
    @Inject(ENTROPY_SOURCE)
    private readonly entropy: EntropySource,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Open a new raffle owned by the caller. Its address is derived from the
   * owner and the number of raffles the owner opened before.
   */
  async create(caller: string, dto: CreateRaffleDto): Promise<RaffleResponseDto> {
    const owner = this.address(caller);
    const decimals = dto.decimals ?? DEFAULT_DECIMALS;
    const currency: RaffleCurrency = dto.token
      ? { kind: 'token', token: this.address(dto.token) }
      : { kind: 'native' };
    const ticketPrice = this.parseAmount(dto.ticketPrice, decimals, 'ticketPrice');
    const fixedPrize =
      dto.fixedPrize !== undefined ? this.parseAmount(dto.fixedPrize, decimals, 'fixedPrize') : undefined;

    const created = await this.lock.runExclusive(`owner:${owner}`, async () => {
      const nonce = await this.raffleRepository.countByOwner(owner);
      const address = getCreateAddress({ from: owner, nonce });
      const raffle = Raffle.open(
        {
          address,
          owner,
          currency,
          decimals,
          ticketPrice,
          durationDays: dto.durationDays,
          fixedPrize,
          donationPercent: dto.donationPercent ?? this.configService.defaultDonationPercent,
          openingBalance: await this.currency.balanceOf(
            currency.kind === 'token' ? currency.token : NATIVE_ASSET,
            address,
          ),
        },
        this.clock.now(),
      );
      return this.raffleRepository.create(raffle);
    });

    this.logger.log(
      `Raffle ${created.address} opened by ${owner}, closes ${created.raffleEndDate.toISOString()}`,
    );
    return this.toResponseDto(created);
  }

  async findAll(): Promise<RaffleResponseDto[]> {
    const raffles = await this.raffleRepository.findAll();
    return raffles.map((raffle) => this.toResponseDto(raffle));
  }

  async findOne(address: string): Promise<RaffleResponseDto> {
    return this.toResponseDto(await this.load(address));
  }

  async getBundles(address: string): Promise<BundleResponseDto[]> {
    const raffle = await this.load(address);
    return raffle.getBundles().map((bundle) => this.toBundleDto(bundle));
  }

  async getTickets(address: string, player: string): Promise<{ player: string; tickets: string }> {
    const raffle = await this.load(address);
    return { player: toChecksumAddress(player) ?? player, tickets: raffle.ticketsOf(player).toString() };
  }

  async listSoldTickets(caller: string, address: string): Promise<{ soldTickets: string }> {
    const raffle = await this.load(address);
    return { soldTickets: raffle.listSoldTickets(this.address(caller)).toString() };
  }

  async listPlayers(caller: string, address: string): Promise<PlayerResponseDto[]> {
    const raffle = await this.load(address);
    return raffle.listPlayers(this.address(caller)).map((player) => ({
      address: player.address,
      tickets: player.tickets.toString(),
    }));
  }

  /**
   * Projected split of the current pot, or the split fixed at settlement
   */
  async getDistribution(address: string): Promise<DistributionResponseDto & { pot: string }> {
    const raffle = await this.load(address);
    return {
      pot: raffle.pot.toString(),
      ...this.toDistributionDto(raffle.distribution ?? raffle.prizeDistribution()),
    };
  }

  async isRaffle(address: string): Promise<boolean> {
    const normalized = toChecksumAddress(address);
    if (!normalized) return false;
    return (await this.raffleRepository.findByAddress(normalized)) !== null;
  }

  async getEvents(address: string): Promise<RaffleEventResponseDto[]> {
    const raffle = await this.load(address);
    return raffle.events.map((event) => ({
      name: event.name,
      height: event.height,
      at: event.at.toISOString(),
      args: event.args,
    }));
  }

  async buyBundle(
    caller: string,
    address: string,
    tier: string,
    dto: BuyBundleDto,
  ): Promise<PurchaseResponseDto> {
    const buyer = this.address(caller);
    if (!isBundleTier(tier)) {
      throw new RaffleError(RaffleErrorCode.INVALID_PURCHASE, `Unknown bundle ${tier}`);
    }

    return this.mutate(address, async (raffle) => {
      const payment = await this.paymentFor(raffle, buyer, dto.value);
      const receipt = raffle.buyBundle(buyer, tier, payment, this.clock.now(), dto.referral);
      await this.collectAndSave(raffle, buyer, receipt.charge);

      this.logger.log(
        `${buyer} bought a ${tier} bundle (${receipt.tickets} tickets) in ${raffle.address}` +
          (dto.referral ? `, referring ${dto.referral}` : ''),
      );
      return {
        tier: receipt.tier,
        ticketsGranted: receipt.tickets.toString(),
        paid: receipt.charge.toString(),
        totalTickets: raffle.ticketsOf(buyer).toString(),
        referral: dto.referral ? this.address(dto.referral) : undefined,
      };
    });
  }

  async claimFreeTicket(caller: string, address: string): Promise<PurchaseResponseDto> {
    const player = this.address(caller);

    return this.mutate(address, async (raffle) => {
      const granted = raffle.claimFreeTicket(player, this.clock.now());
      await this.raffleRepository.save(raffle);

      this.logger.log(`${player} claimed a free ticket in ${raffle.address}`);
      return {
        ticketsGranted: granted.toString(),
        paid: '0',
        totalTickets: raffle.ticketsOf(player).toString(),
      };
    });
  }

  /**
   * Unlabelled native payment: buys the largest bundle the value covers
   */
  async pay(caller: string, address: string, value: string): Promise<PurchaseResponseDto> {
    const buyer = this.address(caller);
    const amount = BigInt(value);

    return this.mutate(address, async (raffle) => {
      const receipt = raffle.receivePayment(buyer, amount, this.clock.now());
      await this.collectAndSave(raffle, buyer, receipt.charge);

      this.logger.log(`${buyer} paid ${amount} into ${raffle.address} for a ${receipt.tier} bundle`);
      return {
        tier: receipt.tier,
        ticketsGranted: receipt.tickets.toString(),
        paid: receipt.charge.toString(),
        totalTickets: raffle.ticketsOf(buyer).toString(),
      };
    });
  }

  /**
   * Value sent to a raffle account through the wallet API. Native value buys
   * tickets the way a direct payment does; other assets are refused.
   */
  async receiveTransfer(
    caller: string,
    address: string,
    asset: string,
    value: string,
  ): Promise<PurchaseResponseDto> {
    if (toAsset(asset) !== NATIVE_ASSET) {
      throw new RaffleError(
        RaffleErrorCode.INVALID_PURCHASE,
        'Raffle accounts only accept transfers in the native currency',
      );
    }
    return this.pay(caller, address, value);
  }

  /**
   * Pick the winner and pay out the pot. The winner is stored before any
   * transfer and every paid share is stored as it leaves. If a transfer fails
   * the paid shares are reversed and the ledger goes back to its unsettled
   * state; when a reversal fails too, the settlement stays with the shares
   * still paid and the rest is left to retryPayouts.
   */
  async finishRaffle(caller: string, address: string, donationAddress: string): Promise<SettlementResponseDto> {
    const owner = this.address(caller);

    return this.mutate(address, async (raffle) => {
      const before = raffle.clone();
      try {
        raffle.finish(owner, donationAddress, this.clock.now(), this.entropy);
      } catch (error) {
        if (error instanceof RaffleError && error.code === RaffleErrorCode.NOT_OWNER) {
          this.logger.warn(`${owner} tried to finish ${raffle.address}`);
        }
        throw error;
      }
      await this.raffleRepository.save(raffle);

      const asset = this.assetOf(raffle);
      const payouts = raffle.pendingPayouts();
      try {
        await this.payPending(raffle, asset, payouts);
      } catch (error) {
        await this.rollbackSettlement(raffle, before, asset, payouts);
        throw error;
      }

      this.logger.log(
        `Winner picked for ${raffle.address}: ${raffle.winner} receives ${raffle.distribution?.prize}`,
      );
      return this.toSettlementDto(raffle);
    });
  }

  /**
   * Pay the shares a settled raffle still owes, in order. Each share is
   * stored as soon as it leaves, so a failure keeps the progress made.
   */
  async retryPayouts(caller: string, address: string): Promise<SettlementResponseDto> {
    const owner = this.address(caller);

    return this.mutate(address, async (raffle) => {
      const payouts = raffle.outstandingPayouts(owner);
      await this.payPending(raffle, this.assetOf(raffle), payouts);

      this.logger.log(`Paid ${payouts.length} outstanding share(s) of ${raffle.address}`);
      return this.toSettlementDto(raffle);
    });
  }

  async getStats(): Promise<Record<RaffleStatus, number> & { total: number }> {
    const raffles = await this.raffleRepository.findAll();
    const now = this.clock.now();
    const byStatus: Record<RaffleStatus, number> = {
      [RaffleStatus.OPEN]: 0,
      [RaffleStatus.CLOSED]: 0,
      [RaffleStatus.SETTLED]: 0,
    };
    for (const raffle of raffles) {
      byStatus[raffle.status(now)] += 1;
    }
    return { total: raffles.length, ...byStatus };
  }

  private async mutate<T>(address: string, work: (raffle: Raffle) => Promise<T>): Promise<T> {
    const key = this.raffleAddress(address);
    return this.lock.runExclusive(key, async () => work(await this.load(key)));
  }

  private async load(address: string): Promise<Raffle> {
    const raffle = await this.raffleRepository.findByAddress(this.raffleAddress(address));
    if (!raffle) {
      throw new RaffleError(RaffleErrorCode.RAFFLE_NOT_FOUND, `Raffle ${address} not found`);
    }
    return raffle;
  }

  private async paymentFor(raffle: Raffle, buyer: string, value: string | undefined): Promise<Payment> {
    if (raffle.currency.kind === 'native') {
      return { medium: 'native', value: BigInt(value ?? '0') };
    }
    const token = raffle.currency.token;
    const [balance, allowance] = await Promise.all([
      this.currency.balanceOf(token, buyer),
      this.currency.allowance(token, buyer, raffle.address),
    ]);
    return { medium: 'token', balance, allowance };
  }

  /**
   * Move the buyer's payment into the raffle account, then persist the
   * ledger. A failed save hands the payment back.
   */
  private async collectAndSave(raffle: Raffle, buyer: string, charge: bigint): Promise<void> {
    const asset = this.assetOf(raffle);

    if (raffle.currency.kind === 'native') {
      const balance = await this.currency.balanceOf(asset, buyer);
      if (balance < charge) {
        throw new RaffleError(RaffleErrorCode.INSUFFICIENT_FUNDS, 'Insufficient funds', {
          required: charge.toString(),
          provided: balance.toString(),
        });
      }
      await this.currency.transfer(asset, buyer, raffle.address, charge);
    } else {
      await this.currency.transferFrom(asset, raffle.address, buyer, raffle.address, charge);
    }

    try {
      await this.raffleRepository.save(raffle);
    } catch (error) {
      this.logger.error(`Saving ${raffle.address} failed, refunding ${charge} to ${buyer}`, error);
      await this.currency.transfer(asset, raffle.address, buyer, charge);
      throw error;
    }
  }

  private async payOut(asset: string, from: string, payout: Payout): Promise<void> {
    try {
      await this.currency.transfer(asset, from, payout.recipient, payout.amount);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`${payout.share} transfer of ${payout.amount} to ${payout.recipient} failed: ${reason}`);
      throw new TransferFailedError(payout.amount, payout.recipient, reason);
    }
  }

  private async payPending(raffle: Raffle, asset: string, payouts: Payout[]): Promise<void> {
    for (const payout of payouts) {
      if (payout.amount > 0n) {
        await this.payOut(asset, raffle.address, payout);
      }
      raffle.recordPayout(payout, this.clock.now());
      await this.raffleRepository.save(raffle);
    }
  }

  /**
   * Return the shares already paid to the raffle account. The unsettled
   * ledger is restored only when every one of them came back; otherwise the
   * settled ledger is kept with the shares that are still out.
   */
  private async rollbackSettlement(
    raffle: Raffle,
    before: Raffle,
    asset: string,
    payouts: Payout[],
  ): Promise<void> {
    const paid = payouts.filter((payout) => raffle.paidShares.includes(payout.share));
    let stranded = 0;

    for (const payout of [...paid].reverse()) {
      try {
        if (payout.amount > 0n) {
          await this.currency.transfer(asset, payout.recipient, raffle.address, payout.amount);
        }
        raffle.reversePayout(payout, this.clock.now());
      } catch (error) {
        stranded += 1;
        this.logger.error(
          `Could not reverse ${payout.share} of ${payout.amount} from ${payout.recipient} for ${raffle.address}`,
          error,
        );
      }
    }

    if (stranded > 0) {
      await this.raffleRepository.save(raffle);
      this.logger.warn(
        `Settlement of ${raffle.address} kept with ${raffle.paidShares.join(', ')} paid; ` +
          `${raffle.pendingPayouts().length} share(s) left for retry`,
      );
      return;
    }

    before.revision = raffle.revision;
    await this.raffleRepository.save(before);
    this.logger.warn(`Settlement of ${raffle.address} rolled back`);
  }

  private assetOf(raffle: Raffle): string {
    return raffle.currency.kind === 'token' ? raffle.currency.token : NATIVE_ASSET;
  }

  private parseAmount(value: string, decimals: number, field: string): bigint {
    try {
      return parseUnits(value, decimals);
    } catch (error) {
      throw new RaffleError(
        RaffleErrorCode.INVALID_PURCHASE,
        `${field} ${value} does not fit ${decimals} decimals`,
      );
    }
  }

  private address(value: string): string {
    const address = toChecksumAddress(value);
    if (!address) {
      throw new RaffleError(RaffleErrorCode.INVALID_ADDRESS, `${value} is not a valid address`);
    }
    return address;
  }

  private raffleAddress(value: string): string {
    const address = toChecksumAddress(value);
    if (!address) {
      throw new RaffleError(RaffleErrorCode.RAFFLE_NOT_FOUND, `Raffle ${value} not found`);
    }
    return address;
  }

  private toSettlementDto(raffle: Raffle): SettlementResponseDto {
    const { winner, donationAddress, distribution } = raffle;
    if (winner === undefined || donationAddress === undefined || distribution === undefined) {
      throw new Error(`Raffle ${raffle.address} is not settled`);
    }
    return {
      winner,
      donationAddress,
      distribution: this.toDistributionDto(distribution),
      paidShares: [...raffle.paidShares],
    };
  }

  private toBundleDto(bundle: Bundle): BundleResponseDto {
    return { tier: bundle.tier, amount: bundle.amount.toString(), price: bundle.price.toString() };
  }

  private toDistributionDto(distribution: PrizeDistribution): DistributionResponseDto {
    return {
      prize: distribution.prize.toString(),
      donation: distribution.donation.toString(),
      commission: distribution.commission.toString(),
    };
  }

  private toResponseDto(raffle: Raffle): RaffleResponseDto {
    return {
      id: raffle.id ?? raffle.address,
      address: raffle.address,
      owner: raffle.owner,
      currency: this.assetOf(raffle),
      decimals: raffle.decimals,
      ticketPrice: raffle.ticketPrice.toString(),
      bundles: raffle.getBundles().map((bundle) => this.toBundleDto(bundle)),
      fixedPrize: raffle.fixedPrize?.toString(),
      donationPercent: raffle.donationPercent,
      raffleEndDate: raffle.raffleEndDate.toISOString(),
      pot: raffle.pot.toString(),
      status: raffle.status(this.clock.now()),
      winner: raffle.winner,
      donationAddress: raffle.donationAddress,
      distribution: raffle.distribution ? this.toDistributionDto(raffle.distribution) : undefined,
      settledAt: raffle.settledAt?.toISOString(),
      paidShares: [...raffle.paidShares],
      createdAt: raffle.createdAt.toISOString(),
      updatedAt: raffle.updatedAt.toISOString(),
    };
  }
}
