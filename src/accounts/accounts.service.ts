import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigError } from '../common/errors';
import { Mutex } from '../common/utils';
import { AccountLease } from './account-lease';
import { CredentialStoreService } from './credential-store.service';
import {
  Account,
  AccountPublicInfo,
  AccountRecord,
  AccountStatusResponse,
} from './interfaces';

/** Consecutive failures after which an account is skipped by rotation. */
export const UNHEALTHY_THRESHOLD = 5;

/**
 * In-memory account registry with round-robin leasing.
 *
 * `acquire` and `release` are synchronous and do no I/O, so each runs to
 * completion on the event loop without interleaving with another request.
 */
@Injectable()
export class AccountsService implements OnModuleInit {
  private readonly logger = new Logger(AccountsService.name);
  private accountsList: Account[] = [];
  private refreshLocks: Mutex[] = [];
  private currentIndex = 0;

  constructor(private readonly credentialStore: CredentialStoreService) {}

  async onModuleInit(): Promise<void> {
    const count = await this.load();
    if (count === 0) {
      throw new ConfigError(
        `No usable accounts in ${this.credentialStore.filePath}`,
      );
    }
  }

  /**
   * Replaces the registry with the store's contents.
   *
   * @returns The number of accounts loaded; zero means nothing can be served
   */
  async load(): Promise<number> {
    const records = await this.credentialStore.load();

    this.accountsList = records.map((record, position) => ({
      position,
      email: record.email,
      refreshToken: record.refresh_token,
      accessToken: '',
      tokenExpiresAt: 0,
      leased: false,
      errorCount: 0,
      lastError: '',
    }));
    // allocated up front so two first-time refreshes never race to create a lock
    this.refreshLocks = this.accountsList.map(() => new Mutex());
    this.currentIndex = 0;

    this.logger.log(`Loaded ${this.accountsList.length} account(s) for rotation`);
    return this.accountsList.length;
  }

  getAccountCount(): number {
    return this.accountsList.length;
  }

  /**
   * Leases the next healthy, idle account in rotation order.
   *
   * When every account is leased or unhealthy, the account at the cursor is
   * leased anyway so requests keep flowing.
   *
   * @returns The leased account, or null when the pool is empty
   */
  acquire(): Account | null {
    const total = this.accountsList.length;
    if (total === 0) {
      return null;
    }

    const start = this.currentIndex;
    for (let scanned = 0; scanned < total; scanned++) {
      const account = this.accountsList[this.currentIndex];
      this.currentIndex = (this.currentIndex + 1) % total;

      if (account.errorCount < UNHEALTHY_THRESHOLD && !account.leased) {
        account.leased = true;
        return account;
      }
    }

    const fallback = this.accountsList[start];
    fallback.leased = true;
    this.logger.warn(
      `No idle healthy account, forcing ${fallback.email} (errors=${fallback.errorCount})`,
    );
    return fallback;
  }

  /**
   * Acquires an account wrapped in a single-use lease.
   */
  lease(): AccountLease | null {
    const account = this.acquire();
    return account ? new AccountLease(this, account) : null;
  }

  /**
   * Returns an account to the pool. An error string counts against its
   * health; a clean release clears all previous failures.
   */
  release(account: Account, error?: string): void {
    account.leased = false;

    if (error) {
      account.errorCount = Math.min(account.errorCount + 1, UNHEALTHY_THRESHOLD);
      account.lastError = error;
      this.logger.warn(
        `Account ${account.email} released with error (${account.errorCount}/${UNHEALTHY_THRESHOLD}): ${error}`,
      );
      return;
    }

    account.errorCount = 0;
  }

  /**
   * Returns an account after a failure it did not cause. Health and the
   * last recorded error are left as they were.
   */
  releaseNeutral(account: Account): void {
    account.leased = false;
  }

  refreshLockFor(account: Account): Mutex {
    const lock = this.refreshLocks[account.position];
    if (!lock) {
      throw new Error(`No refresh lock for account position ${account.position}`);
    }
    return lock;
  }

  /** Writes every account's current refresh token back to the store. */
  persist(): Promise<void> {
    return this.credentialStore.save(() => this.toRecords());
  }

  getStatus(): AccountStatusResponse {
    const accounts: AccountPublicInfo[] = this.accountsList.map((account) => ({
      index: account.position,
      identity: this.maskEmail(account.email),
      errors: account.errorCount,
      leased: account.leased,
      has_token: account.accessToken !== '',
      last_error: account.lastError || null,
    }));

    return {
      total: this.accountsList.length,
      available: this.accountsList.filter(
        (account) => account.errorCount < UNHEALTHY_THRESHOLD,
      ).length,
      accounts,
    };
  }

  /**
   * Masks an email address for the unauthenticated status route.
   * Example: "john.doe@gmail.com" -> "j******e@g***l.com"
   */
  maskEmail(email: string): string {
    const parts = email.split('@');
    const local = parts[0];
    const domain = parts[1];
    if (!local || !domain) return '***';

    const maskedLocal =
      local.length <= 2
        ? '*'.repeat(local.length)
        : local[0] + '*'.repeat(local.length - 2) + local[local.length - 1];

    const domainParts = domain.split('.');
    const domainName = domainParts[0];
    const tld = domainParts.slice(1).join('.');

    if (!domainName) return `${maskedLocal}@***`;

    const maskedDomain =
      domainName.length <= 2
        ? '*'.repeat(domainName.length)
        : domainName[0] +
          '*'.repeat(domainName.length - 2) +
          domainName[domainName.length - 1];

    return tld ? `${maskedLocal}@${maskedDomain}.${tld}` : `${maskedLocal}@${maskedDomain}`;
  }

  private toRecords(): AccountRecord[] {
    return this.accountsList.map((account) => ({
      email: account.email,
      refresh_token: account.refreshToken,
    }));
  }
}
