import { Injectable, Logger } from '@nestjs/common';
import { TokenRefreshError } from '../common/errors';
import { isRecord, truncate } from '../common/utils';
import { UpstreamService } from '../upstream/upstream.service';
import { UpstreamTextResponse } from '../upstream/interfaces';
import { AccountsService } from './accounts.service';
import { Account } from './interfaces';

/** Lifetime of an upstream access token. */
export const TOKEN_LIFETIME_MS = 900 * 1000;
/** Tokens this close to expiry are refreshed before use. */
export const REFRESH_MARGIN_MS = 60 * 1000;

const REFRESH_COOKIE = 'refreshToken=';

@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly accountsService: AccountsService,
    private readonly upstreamService: UpstreamService,
  ) {}

  isTokenValid(account: Account, now = Date.now()): boolean {
    return (
      account.accessToken !== '' &&
      now < account.tokenExpiresAt - REFRESH_MARGIN_MS
    );
  }

  /**
   * Gets a usable access token for an account, refreshing it first when
   * missing or close to expiry. Concurrent callers for the same account
   * share one refresh.
   *
   * @throws TokenRefreshError if the upstream refuses the refresh
   */
  async ensureToken(account: Account): Promise<string> {
    if (this.isTokenValid(account)) {
      return account.accessToken;
    }

    return this.accountsService.refreshLockFor(account).runExclusive(async () => {
      // another caller may have refreshed while this one waited
      if (this.isTokenValid(account)) {
        return account.accessToken;
      }
      return this.refreshToken(account);
    });
  }

  /**
   * Trades the account's refresh token for a new access token. A rotated
   * refresh token is stored and written to disk before this resolves.
   */
  private async refreshToken(account: Account): Promise<string> {
    this.logger.log(`[${account.email}] Refreshing access token`);
    const presented = account.refreshToken;

    let response: UpstreamTextResponse;
    try {
      response = await this.upstreamService.refreshSession(presented);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      throw new TokenRefreshError(`Token refresh failed: ${errorMessage}`);
    }

    if (response.status !== 200) {
      throw new TokenRefreshError(
        `Token refresh failed [${response.status}]: ${truncate(response.body)}`,
      );
    }

    const token = this.extractToken(response.body);
    if (!token) {
      throw new TokenRefreshError(
        `No token in refresh response: ${truncate(response.body)}`,
      );
    }

    account.accessToken = token;
    account.tokenExpiresAt = Date.now() + TOKEN_LIFETIME_MS;

    const rotated = this.extractRotatedRefreshToken(response.setCookies);
    if (rotated && rotated !== presented) {
      account.refreshToken = rotated;
      await this.accountsService.persist();
      this.logger.log(`[${account.email}] Refresh token rotated and saved`);
    }

    return token;
  }

  private extractToken(body: string): string {
    try {
      const data: unknown = JSON.parse(body);
      if (!isRecord(data)) return '';
      const { token } = data;
      return typeof token === 'string' ? token : '';
    } catch {
      return '';
    }
  }

  private extractRotatedRefreshToken(setCookies: string[]): string {
    for (const cookie of setCookies) {
      const start = cookie.indexOf(REFRESH_COOKIE);
      if (start === -1) continue;
      const value = cookie.slice(start + REFRESH_COOKIE.length).split(';')[0];
      if (value) return value.trim();
    }
    return '';
  }
}
