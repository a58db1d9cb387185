import { Injectable } from '@nestjs/common';
import { RafflesService } from './raffles/application/raffles.service';

@Injectable()
export class AppService {
  constructor(private readonly rafflesService: RafflesService) {}

  getHello() {
    return { message: 'Raffle Ledger API is running' };
  }

  /**
   * Raffle counts by lifecycle stage
   */
  async getStats() {
    return { raffles: await this.rafflesService.getStats() };
  }
}
