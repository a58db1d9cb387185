import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Caller } from '../../auth/decorators/caller.decorator';
import { RafflesService } from '../application/raffles.service';
import { BuyBundleDto } from '../application/dto/buy-bundle.dto';
import { CreateRaffleDto } from '../application/dto/create-raffle.dto';
import { FinishRaffleDto } from '../application/dto/finish-raffle.dto';
import { PayDto } from '../application/dto/pay.dto';
import { RaffleExceptionFilter } from './raffle-exception.filter';

@Controller('raffles')
@UseGuards(AuthGuard('jwt'))
@UseFilters(RaffleExceptionFilter)
export class RafflesController {
  constructor(private readonly rafflesService: RafflesService) {}

  @Post()
  async create(@Caller() caller: string, @Body() dto: CreateRaffleDto) {
    return this.rafflesService.create(caller, dto);
  }

  @Get()
  async findAll() {
    return this.rafflesService.findAll();
  }

  @Get(':address')
  async findOne(@Param('address') address: string) {
    return this.rafflesService.findOne(address);
  }

  @Get(':address/bundles')
  async getBundles(@Param('address') address: string) {
    return this.rafflesService.getBundles(address);
  }

  @Get(':address/tickets/:player')
  async getTickets(@Param('address') address: string, @Param('player') player: string) {
    return this.rafflesService.getTickets(address, player);
  }

  @Get(':address/sold')
  async listSoldTickets(@Caller() caller: string, @Param('address') address: string) {
    return this.rafflesService.listSoldTickets(caller, address);
  }

  @Get(':address/players')
  async listPlayers(@Caller() caller: string, @Param('address') address: string) {
    return this.rafflesService.listPlayers(caller, address);
  }

  @Get(':address/distribution')
  async getDistribution(@Param('address') address: string) {
    return this.rafflesService.getDistribution(address);
  }

  @Get(':address/events')
  async getEvents(@Param('address') address: string) {
    return this.rafflesService.getEvents(address);
  }

  @Post(':address/bundles/:tier')
  @HttpCode(HttpStatus.OK)
  async buyBundle(
    @Caller() caller: string,
    @Param('address') address: string,
    @Param('tier') tier: string,
    @Body() dto: BuyBundleDto,
  ) {
    return this.rafflesService.buyBundle(caller, address, tier, dto);
  }

  @Post(':address/free-ticket')
  @HttpCode(HttpStatus.OK)
  async claimFreeTicket(@Caller() caller: string, @Param('address') address: string) {
    return this.rafflesService.claimFreeTicket(caller, address);
  }

  /**
   * Direct payment without choosing a bundle
   */
  @Post(':address/pay')
  @HttpCode(HttpStatus.OK)
  async pay(@Caller() caller: string, @Param('address') address: string, @Body() dto: PayDto) {
    return this.rafflesService.pay(caller, address, dto.value);
  }

  @Post(':address/finish')
  @HttpCode(HttpStatus.OK)
  async finishRaffle(
    @Caller() caller: string,
    @Param('address') address: string,
    @Body() dto: FinishRaffleDto,
  ) {
    return this.rafflesService.finishRaffle(caller, address, dto.donationAddress);
  }

  /**
   * Pay the shares a settled raffle still owes
   */
  @Post(':address/payouts')
  @HttpCode(HttpStatus.OK)
  async retryPayouts(@Caller() caller: string, @Param('address') address: string) {
    return this.rafflesService.retryPayouts(caller, address);
  }
}
