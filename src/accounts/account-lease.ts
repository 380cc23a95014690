import type { AccountsService } from './accounts.service';
import { Account } from './interfaces';

/**
 * A leased account that can be handed back exactly once. Whoever ends the
 * request calls {@link AccountLease.release}; later calls are ignored.
 */
export class AccountLease {
  private released = false;

  constructor(
    private readonly accountsService: AccountsService,
    readonly account: Account,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * @param error - Short diagnostic counted against the account's health
   * @returns False when the lease had already been released
   */
  release(error?: string): boolean {
    return this.settle(() => this.accountsService.release(this.account, error));
  }

  /** Hands the account back without touching its health. */
  releaseNeutral(): boolean {
    return this.settle(() => this.accountsService.releaseNeutral(this.account));
  }

  private settle(returnAccount: () => void): boolean {
    if (this.released) {
      return false;
    }
    this.released = true;
    returnAccount();
    return true;
  }
}
