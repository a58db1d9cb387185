import {
  Body,
  Controller,
  forwardRef,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Post,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Caller } from '../../auth/decorators/caller.decorator';
import { RafflesService } from '../../raffles/application/raffles.service';
import { RaffleExceptionFilter } from '../../raffles/presentation/raffle-exception.filter';
import { WalletsService } from '../application/wallets.service';
import { AmountDto } from '../application/dto/amount.dto';
import { ApproveDto } from '../application/dto/approve.dto';
import { TransferDto } from '../application/dto/transfer.dto';

@Controller('wallets')
@UseGuards(AuthGuard('jwt'))
@UseFilters(RaffleExceptionFilter)
export class WalletsController {
  constructor(
    private readonly walletsService: WalletsService,
    @Inject(forwardRef(() => RafflesService))
    private readonly rafflesService: RafflesService,
  ) {}

  @Get(':asset/:account')
  async getBalance(@Param('asset') asset: string, @Param('account') account: string) {
    return this.walletsService.getBalance(asset, account);
  }

  @Get(':asset/:owner/allowance/:spender')
  async getAllowance(
    @Param('asset') asset: string,
    @Param('owner') owner: string,
    @Param('spender') spender: string,
  ) {
    return this.walletsService.getAllowance(asset, owner, spender);
  }

  @Post(':asset/approve')
  @HttpCode(HttpStatus.OK)
  async approve(@Caller() caller: string, @Param('asset') asset: string, @Body() dto: ApproveDto) {
    await this.walletsService.approve(asset, caller, dto.spender, BigInt(dto.amount));
    return this.walletsService.getAllowance(asset, caller, dto.spender);
  }

  /**
   * Value sent to a raffle account goes through the raffle ledger as a direct payment
   */
  @Post(':asset/transfer')
  @HttpCode(HttpStatus.OK)
  async transfer(@Caller() caller: string, @Param('asset') asset: string, @Body() dto: TransferDto) {
    if (await this.rafflesService.isRaffle(dto.to)) {
      return this.rafflesService.receiveTransfer(caller, dto.to, asset, dto.amount);
    }
    await this.walletsService.transfer(asset, caller, dto.to, BigInt(dto.amount));
    return this.walletsService.getBalance(asset, caller);
  }

  @Post(':asset/deposit')
  @HttpCode(HttpStatus.OK)
  async deposit(@Caller() caller: string, @Param('asset') asset: string, @Body() dto: AmountDto) {
    return this.walletsService.deposit(asset, caller, BigInt(dto.amount));
  }
}
