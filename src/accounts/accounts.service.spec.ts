import { Test, TestingModule } from '@nestjs/testing';
import { AccountsService, UNHEALTHY_THRESHOLD } from './accounts.service';
import { CredentialStoreService } from './credential-store.service';
import { ConfigError } from '../common/errors';
import { Account, AccountRecord } from './interfaces';

describe('AccountsService', () => {
  let service: AccountsService;

  const records: AccountRecord[] = [
    { email: 'acc1@example.com', refresh_token: 'r1' },
    { email: 'acc2@example.com', refresh_token: 'r2' },
    { email: 'acc3@example.com', refresh_token: 'r3' },
  ];

  const mockCredentialStore = {
    filePath: '/tmp/accounts.json',
    load: jest.fn(),
    save: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockCredentialStore.load.mockResolvedValue(records);
    mockCredentialStore.save.mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AccountsService,
        { provide: CredentialStoreService, useValue: mockCredentialStore },
      ],
    }).compile();

    service = module.get<AccountsService>(AccountsService);
    await service.onModuleInit();
  });

  const acquireOrFail = (): Account => {
    const account = service.acquire();
    if (!account) throw new Error('expected an account');
    return account;
  };

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('load', () => {
    it('should build one idle account per record', async () => {
      await expect(service.load()).resolves.toBe(3);
      expect(service.getAccountCount()).toBe(3);
      expect(service.getStatus().accounts).toEqual([
        {
          index: 0,
          identity: 'a**1@e*****e.com',
          errors: 0,
          leased: false,
          has_token: false,
          last_error: null,
        },
        {
          index: 1,
          identity: 'a**2@e*****e.com',
          errors: 0,
          leased: false,
          has_token: false,
          last_error: null,
        },
        {
          index: 2,
          identity: 'a**3@e*****e.com',
          errors: 0,
          leased: false,
          has_token: false,
          last_error: null,
        },
      ]);
    });

    it('should fail module init with ConfigError when nothing is usable', async () => {
      mockCredentialStore.load.mockResolvedValue([]);

      await expect(service.onModuleInit()).rejects.toThrow(ConfigError);
      expect(service.getAccountCount()).toBe(0);
    });
  });

  describe('acquire', () => {
    it('should hand out every healthy idle account exactly once', () => {
      const leased = [acquireOrFail(), acquireOrFail(), acquireOrFail()];

      expect(leased.map((a) => a.email)).toEqual([
        'acc1@example.com',
        'acc2@example.com',
        'acc3@example.com',
      ]);
      expect(new Set(leased).size).toBe(3);
      expect(leased.every((a) => a.leased)).toBe(true);
    });

    it('should continue rotation after released accounts', () => {
      const first = acquireOrFail();
      service.release(first);

      expect(acquireOrFail().email).toBe('acc2@example.com');
      expect(acquireOrFail().email).toBe('acc3@example.com');
      expect(acquireOrFail().email).toBe('acc1@example.com');
    });

    it('should skip unhealthy accounts', () => {
      const first = acquireOrFail();
      for (let i = 0; i < UNHEALTHY_THRESHOLD; i++) {
        first.leased = true;
        service.release(first, 'upstream failure');
      }

      const picked = [acquireOrFail(), acquireOrFail()];
      expect(picked.map((a) => a.email)).toEqual([
        'acc2@example.com',
        'acc3@example.com',
      ]);
    });

    it('should force a lease when every account is unhealthy', () => {
      for (let i = 0; i < 3; i++) {
        const account = acquireOrFail();
        for (let j = 0; j < UNHEALTHY_THRESHOLD; j++) {
          service.release(account, 'boom');
        }
      }

      const forced = service.acquire();
      expect(forced).not.toBeNull();
      expect(forced?.email).toBe('acc1@example.com');
      expect(forced?.leased).toBe(true);
    });

    it('should force a lease on the cursor account when all are leased', () => {
      acquireOrFail();
      acquireOrFail();
      acquireOrFail();

      const forced = acquireOrFail();
      expect(forced.email).toBe('acc1@example.com');
      expect(acquireOrFail().email).toBe('acc1@example.com');
    });

    it('should return null for an empty pool', async () => {
      mockCredentialStore.load.mockResolvedValue([]);
      await service.load();

      expect(service.acquire()).toBeNull();
      expect(service.lease()).toBeNull();
    });
  });

  describe('release', () => {
    it('should count errors up to the threshold and reset on a clean release', () => {
      const account = acquireOrFail();

      for (let i = 0; i < UNHEALTHY_THRESHOLD; i++) {
        service.release(account, `failure ${i}`);
      }
      expect(account.errorCount).toBe(UNHEALTHY_THRESHOLD);
      expect(account.lastError).toBe('failure 4');
      expect(service.getStatus().available).toBe(2);

      service.release(account, 'one more');
      expect(account.errorCount).toBe(UNHEALTHY_THRESHOLD);

      service.release(account);
      expect(account.errorCount).toBe(0);
      expect(account.leased).toBe(false);
      expect(service.getStatus().available).toBe(3);
    });

    it('should make a recovered account eligible again', () => {
      const account = acquireOrFail();
      for (let i = 0; i < UNHEALTHY_THRESHOLD; i++) {
        service.release(account, 'boom');
      }
      service.release(account);

      acquireOrFail();
      acquireOrFail();
      expect(acquireOrFail()).toBe(account);
    });
  });

  describe('releaseNeutral', () => {
    it('should free the account without touching its health', () => {
      const account = acquireOrFail();
      service.release(account, 'e1');
      service.release(account, 'e2');
      service.release(account, 'e3');
      account.leased = true;

      service.releaseNeutral(account);

      expect(account.leased).toBe(false);
      expect(account.errorCount).toBe(3);
      expect(account.lastError).toBe('e3');
    });
  });

  describe('lease', () => {
    it('should release the underlying account only once', () => {
      const lease = service.lease();
      if (!lease) throw new Error('expected a lease');

      expect(lease.release('first')).toBe(true);
      expect(lease.release('second')).toBe(false);
      expect(lease.isReleased).toBe(true);
      expect(lease.account.errorCount).toBe(1);
      expect(lease.account.lastError).toBe('first');
    });

    it('should allow a single neutral release', () => {
      const lease = service.lease();
      if (!lease) throw new Error('expected a lease');
      service.release(lease.account, 'earlier failure');
      lease.account.leased = true;

      expect(lease.releaseNeutral()).toBe(true);
      expect(lease.release()).toBe(false);
      expect(lease.account.errorCount).toBe(1);
      expect(lease.account.leased).toBe(false);
    });
  });

  describe('refreshLockFor', () => {
    it('should give each account its own lock', () => {
      const first = acquireOrFail();
      const second = acquireOrFail();

      expect(service.refreshLockFor(first)).toBe(service.refreshLockFor(first));
      expect(service.refreshLockFor(first)).not.toBe(
        service.refreshLockFor(second),
      );
    });
  });

  describe('persist', () => {
    it('should save the current refresh tokens', async () => {
      const account = acquireOrFail();
      account.refreshToken = 'rotated';

      await service.persist();

      const snapshot: () => AccountRecord[] =
        mockCredentialStore.save.mock.calls[0][0];
      expect(snapshot()).toEqual([
        { email: 'acc1@example.com', refresh_token: 'rotated' },
        { email: 'acc2@example.com', refresh_token: 'r2' },
        { email: 'acc3@example.com', refresh_token: 'r3' },
      ]);
    });
  });

  describe('getStatus', () => {
    it('should report lease, token and error state', () => {
      const account = acquireOrFail();
      account.accessToken = 'token';
      const other = acquireOrFail();
      service.release(other, 'Token refresh failed [401]');

      expect(service.getStatus()).toEqual({
        total: 3,
        available: 3,
        accounts: [
          {
            index: 0,
            identity: 'a**1@e*****e.com',
            errors: 0,
            leased: true,
            has_token: true,
            last_error: null,
          },
          {
            index: 1,
            identity: 'a**2@e*****e.com',
            errors: 1,
            leased: false,
            has_token: false,
            last_error: 'Token refresh failed [401]',
          },
          {
            index: 2,
            identity: 'a**3@e*****e.com',
            errors: 0,
            leased: false,
            has_token: false,
            last_error: null,
          },
        ],
      });
    });
  });

  describe('getStatus with colliding masks', () => {
    it('should tell accounts apart by index', async () => {
      mockCredentialStore.load.mockResolvedValue([
        { email: 'ab@x.com', refresh_token: 'r1' },
        { email: 'ac@x.com', refresh_token: 'r2' },
      ]);
      await service.load();

      expect(
        service.getStatus().accounts.map(({ index, identity }) => ({
          index,
          identity,
        })),
      ).toEqual([
        { index: 0, identity: '**@x.com' },
        { index: 1, identity: '**@x.com' },
      ]);
    });
  });

  describe('maskEmail', () => {
    it('should mask local part and domain name', () => {
      expect(service.maskEmail('john.doe@gmail.com')).toBe('j******e@g***l.com');
      expect(service.maskEmail('ab@cd.io')).toBe('**@**.io');
      expect(service.maskEmail('?')).toBe('***');
    });
  });
});
