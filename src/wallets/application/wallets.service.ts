import { BadRequestException, ForbiddenException, Inject, Injectable, Logger } from '@nestjs/common';
import { toChecksumAddress } from '../../common/address';
import { ConfigService } from '../../database/config.service';
import { toAsset } from '../domain/asset';
import { CurrencyPort } from '../domain/currency.port';
import { IWalletRepository, WALLET_REPOSITORY } from '../domain/wallet.repository';
import { AllowanceResponseDto, BalanceResponseDto } from './dto/wallet-response.dto';

@Injectable()
export class WalletsService implements CurrencyPort {
  private readonly logger = new Logger(WalletsService.name);

  constructor(
    @Inject(WALLET_REPOSITORY)
    private readonly walletRepository: IWalletRepository,
    private readonly configService: ConfigService,
  ) {}

  async balanceOf(asset: string, account: string): Promise<bigint> {
    return this.walletRepository.getBalance(this.asset(asset), this.address(account));
  }

  async allowance(asset: string, owner: string, spender: string): Promise<bigint> {
    return this.walletRepository.getAllowance(
      this.asset(asset),
      this.address(owner),
      this.address(spender),
    );
  }

  async approve(asset: string, owner: string, spender: string, amount: bigint): Promise<void> {
    this.assertAmount(amount);
    await this.walletRepository.setAllowance(
      this.asset(asset),
      this.address(owner),
      this.address(spender),
      amount,
    );
  }

  async transfer(asset: string, from: string, to: string, amount: bigint): Promise<void> {
    this.assertAmount(amount);
    if (amount === 0n) return;

    const assetKey = this.asset(asset);
    const sender = this.address(from);
    const recipient = this.address(to);

    const debited = await this.walletRepository.debit(assetKey, sender, amount);
    if (!debited) {
      throw new BadRequestException(`Insufficient balance: ${sender} cannot send ${amount}`);
    }
    await this.walletRepository.credit(assetKey, recipient, amount);
  }

  async transferFrom(
    asset: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): Promise<void> {
    this.assertAmount(amount);
    if (amount === 0n) return;

    const assetKey = this.asset(asset);
    const spenderAddress = this.address(spender);
    const sender = this.address(from);
    const recipient = this.address(to);

    const spent = await this.walletRepository.spendAllowance(assetKey, sender, spenderAddress, amount);
    if (!spent) {
      throw new BadRequestException(
        `Insufficient allowance: ${spenderAddress} may not move ${amount} from ${sender}`,
      );
    }

    const debited = await this.walletRepository.debit(assetKey, sender, amount);
    if (!debited) {
      await this.walletRepository.restoreAllowance(assetKey, sender, spenderAddress, amount);
      throw new BadRequestException(`Insufficient balance: ${sender} cannot send ${amount}`);
    }
    await this.walletRepository.credit(assetKey, recipient, amount);
  }

  /**
   * Credit the caller out of thin air. Only for local and test networks.
   */
  async deposit(asset: string, account: string, amount: bigint): Promise<BalanceResponseDto> {
    if (!this.configService.allowDeposits) {
      throw new ForbiddenException('Deposits are disabled');
    }
    this.assertAmount(amount);

    const assetKey = this.asset(asset);
    const address = this.address(account);
    await this.walletRepository.credit(assetKey, address, amount);
    this.logger.log(`Deposited ${amount} ${assetKey} to ${address}`);
    return this.getBalance(assetKey, address);
  }

  async getBalance(asset: string, account: string): Promise<BalanceResponseDto> {
    const assetKey = this.asset(asset);
    const address = this.address(account);
    const balance = await this.walletRepository.getBalance(assetKey, address);
    return { asset: assetKey, account: address, balance: balance.toString() };
  }

  async getAllowance(asset: string, owner: string, spender: string): Promise<AllowanceResponseDto> {
    const assetKey = this.asset(asset);
    const ownerAddress = this.address(owner);
    const spenderAddress = this.address(spender);
    const amount = await this.walletRepository.getAllowance(assetKey, ownerAddress, spenderAddress);
    return { asset: assetKey, owner: ownerAddress, spender: spenderAddress, amount: amount.toString() };
  }

  private asset(value: string): string {
    const asset = toAsset(value);
    if (!asset) {
      throw new BadRequestException(`${value} is neither "native" nor a token address`);
    }
    return asset;
  }

  private address(value: string): string {
    const address = toChecksumAddress(value);
    if (!address) {
      throw new BadRequestException(`${value} is not a valid address`);
    }
    return address;
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new BadRequestException('Amount cannot be negative');
    }
  }
}
