/** One entry of the accounts file, as written back on rotation. */
export interface AccountRecord {
  email: string;
  refresh_token: string;
}

export interface Account {
  /** Index in the pool; also keys the account's refresh lock. */
  readonly position: number;
  readonly email: string;
  refreshToken: string;
  accessToken: string;
  /** Epoch ms at which the upstream access token stops being accepted. */
  tokenExpiresAt: number;
  leased: boolean;
  errorCount: number;
  lastError: string;
}

export interface AccountStatusResponse {
  total: number;
  available: number;
  accounts: AccountPublicInfo[];
}

export interface AccountPublicInfo {
  /** Position in the pool; tells apart accounts whose masked identities collide. */
  index: number;
  identity: string;
  errors: number;
  leased: boolean;
  has_token: boolean;
  last_error: string | null;
}
