import { UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { HDNodeWallet, Wallet } from 'ethers';
import { CLOCK } from '../common/clock';
import { ConfigService } from '../database/config.service';
import { FixedClock } from '../../test/fakes/fixed-clock';
import { AuthService, buildLoginMessage } from './auth.service';
import { JwtPayload, JwtStrategy } from './strategies/jwt.strategy';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('AuthService', () => {
  let service: AuthService;
  let jwtService: JwtService;
  let wallet: HDNodeWallet;

  beforeEach(async () => {
    jwtService = new JwtService({ secret: 'test-secret', signOptions: { expiresIn: '1h' } });
    const moduleRef = await Test.createTestingModule({
      providers: [
        AuthService,
        ConfigService,
        { provide: JwtService, useValue: jwtService },
        { provide: CLOCK, useValue: new FixedClock(NOW) },
      ],
    }).compile();
    moduleRef.useLogger(false);

    service = moduleRef.get(AuthService);
    wallet = Wallet.createRandom();
  });

  it('builds the message a wallet signs', () => {
    expect(buildLoginMessage('0xabc', '2026-03-01T12:00:00.000Z')).toBe(
      'Sign in to Raffle Ledger\nAddress: 0xabc\nIssued at: 2026-03-01T12:00:00.000Z',
    );
  });

  it('issues a token for the signing address', async () => {
    const issuedAt = '2026-03-01T11:59:00.000Z';
    const signature = await wallet.signMessage(buildLoginMessage(wallet.address, issuedAt));

    const result = await service.login({ address: wallet.address.toLowerCase(), issuedAt, signature });

    expect(result.address).toBe(wallet.address);
    expect(jwtService.verify<JwtPayload>(result.accessToken).sub).toBe(wallet.address);
  });

  it('rejects a message signed by someone else', async () => {
    const issuedAt = NOW.toISOString();
    const other = Wallet.createRandom();
    const signature = await other.signMessage(buildLoginMessage(wallet.address, issuedAt));

    await expect(service.login({ address: wallet.address, issuedAt, signature })).rejects.toThrow(
      'Invalid signature',
    );
  });

  it('rejects a signature over a different timestamp', async () => {
    const signature = await wallet.signMessage(buildLoginMessage(wallet.address, '2026-03-01T11:58:00.000Z'));

    await expect(
      service.login({ address: wallet.address, issuedAt: '2026-03-01T11:59:00.000Z', signature }),
    ).rejects.toThrow(UnauthorizedException);
  });

  it('rejects stale messages', async () => {
    const issuedAt = '2026-03-01T11:54:59.000Z';
    const signature = await wallet.signMessage(buildLoginMessage(wallet.address, issuedAt));

    await expect(service.login({ address: wallet.address, issuedAt, signature })).rejects.toThrow(
      'Login message expired',
    );
  });
});

describe('JwtStrategy', () => {
  const strategy = new JwtStrategy(new ConfigService());

  it('checksums the token subject', () => {
    const wallet = Wallet.createRandom();

    expect(strategy.validate({ sub: wallet.address.toLowerCase() })).toEqual({ address: wallet.address });
  });

  it('rejects a subject that is not an address', () => {
    expect(() => strategy.validate({ sub: 'someone' })).toThrow(UnauthorizedException);
  });
});
