import { BadRequestException, ForbiddenException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ConfigService } from '../../database/config.service';
import { addressOf } from '../../../test/support/addresses';
import { InMemoryWalletRepository } from '../../../test/fakes/in-memory-wallet.repository';
import { NATIVE_ASSET } from '../domain/asset';
import { WALLET_REPOSITORY } from '../domain/wallet.repository';
import { WalletsService } from './wallets.service';

const ALICE = addressOf(2);
const BOB = addressOf(3);
const SPENDER = addressOf(100);
const TOKEN = addressOf(200);

describe('WalletsService', () => {
  let service: WalletsService;
  let wallets: InMemoryWalletRepository;

  beforeEach(async () => {
    wallets = new InMemoryWalletRepository();
    const moduleRef = await Test.createTestingModule({
      providers: [WalletsService, ConfigService, { provide: WALLET_REPOSITORY, useValue: wallets }],
    }).compile();
    moduleRef.useLogger(false);

    service = moduleRef.get(WalletsService);
    await wallets.credit(NATIVE_ASSET, ALICE, 1000n);
    await wallets.credit(TOKEN, ALICE, 1000n);
  });

  describe('transfer', () => {
    it('moves value between accounts', async () => {
      await service.transfer('NATIVE', ALICE, BOB.toLowerCase(), 400n);

      expect(await service.balanceOf(NATIVE_ASSET, ALICE)).toBe(600n);
      expect(await service.balanceOf(NATIVE_ASSET, BOB)).toBe(400n);
    });

    it('refuses to overdraw', async () => {
      await expect(service.transfer(NATIVE_ASSET, ALICE, BOB, 1001n)).rejects.toThrow(BadRequestException);

      expect(await service.balanceOf(NATIVE_ASSET, ALICE)).toBe(1000n);
      expect(await service.balanceOf(NATIVE_ASSET, BOB)).toBe(0n);
    });

    it('ignores zero amounts', async () => {
      await service.transfer(NATIVE_ASSET, BOB, ALICE, 0n);

      expect(await service.balanceOf(NATIVE_ASSET, BOB)).toBe(0n);
    });

    it('rejects negative amounts', async () => {
      await expect(service.transfer(NATIVE_ASSET, ALICE, BOB, -1n)).rejects.toThrow('Amount cannot be negative');
    });

    it('rejects malformed addresses and assets', async () => {
      await expect(service.transfer(NATIVE_ASSET, ALICE, 'bob', 1n)).rejects.toThrow('bob is not a valid address');
      await expect(service.transfer('gold', ALICE, BOB, 1n)).rejects.toThrow(BadRequestException);
    });
  });

  describe('transferFrom', () => {
    it('spends the approval', async () => {
      await service.approve(TOKEN, ALICE, SPENDER, 700n);

      await service.transferFrom(TOKEN, SPENDER, ALICE, BOB, 500n);

      expect(await service.balanceOf(TOKEN, ALICE)).toBe(500n);
      expect(await service.balanceOf(TOKEN, BOB)).toBe(500n);
      expect(await service.allowance(TOKEN, ALICE, SPENDER)).toBe(200n);
    });

    it('requires enough approval', async () => {
      await service.approve(TOKEN, ALICE, SPENDER, 499n);

      await expect(service.transferFrom(TOKEN, SPENDER, ALICE, BOB, 500n)).rejects.toThrow(
        `Insufficient allowance: ${SPENDER} may not move 500 from ${ALICE}`,
      );
      expect(await service.balanceOf(TOKEN, ALICE)).toBe(1000n);
    });

    it('restores the approval when the balance falls short', async () => {
      await service.approve(TOKEN, ALICE, SPENDER, 5000n);

      await expect(service.transferFrom(TOKEN, SPENDER, ALICE, BOB, 2000n)).rejects.toThrow(
        `Insufficient balance: ${ALICE} cannot send 2000`,
      );
      expect(await service.allowance(TOKEN, ALICE, SPENDER)).toBe(5000n);
    });
  });

  describe('reads', () => {
    it('reports balances and approvals as strings', async () => {
      await service.approve(TOKEN.toLowerCase(), ALICE, SPENDER, 42n);

      expect(await service.getBalance(TOKEN, ALICE)).toEqual({ asset: TOKEN, account: ALICE, balance: '1000' });
      expect(await service.getAllowance(TOKEN, ALICE, SPENDER)).toEqual({
        asset: TOKEN,
        owner: ALICE,
        spender: SPENDER,
        amount: '42',
      });
    });
  });

  describe('deposit', () => {
    const previous = process.env.ALLOW_DEPOSITS;

    afterEach(() => {
      if (previous === undefined) {
        delete process.env.ALLOW_DEPOSITS;
      } else {
        process.env.ALLOW_DEPOSITS = previous;
      }
    });

    it('is disabled by default', async () => {
      delete process.env.ALLOW_DEPOSITS;

      await expect(service.deposit(NATIVE_ASSET, BOB, 10n)).rejects.toThrow(ForbiddenException);
    });

    it('credits the account when enabled', async () => {
      process.env.ALLOW_DEPOSITS = 'true';

      expect(await service.deposit(NATIVE_ASSET, BOB, 10n)).toEqual({
        asset: NATIVE_ASSET,
        account: BOB,
        balance: '10',
      });
    });
  });
});
