import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { ConfigError } from '../common/errors';
import { Mutex, isRecord } from '../common/utils';
import { AccountRecord } from './interfaces';

/**
 * Reads and rewrites the JSON accounts file produced by the signup
 * pipeline. Rewrites are serialized and land through a rename, so readers
 * never see a half-written file.
 */
@Injectable()
export class CredentialStoreService {
  private readonly logger = new Logger(CredentialStoreService.name);
  private readonly writeLock = new Mutex();
  readonly filePath: string;

  constructor(private readonly configService: ConfigService) {
    this.filePath = resolve(
      this.configService.get<string>('accounts.file') || 'data/accounts.json',
    );
  }

  async load(): Promise<AccountRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      throw new ConfigError(
        `Cannot read accounts file ${this.filePath}: ${errorMessage}`,
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      throw new ConfigError(`Accounts file ${this.filePath} is not valid JSON`);
    }

    const items: unknown[] = Array.isArray(data) ? data : [data];
    const records: AccountRecord[] = [];

    for (const item of items) {
      if (!isRecord(item)) {
        this.logger.warn('Skipping accounts entry that is not an object');
        continue;
      }

      const rawEmail = item.email;
      const email = typeof rawEmail === 'string' && rawEmail ? rawEmail : '?';
      const refreshToken = this.extractRefreshToken(item);
      if (!refreshToken) {
        this.logger.warn(`Skipping account without refresh token: ${email}`);
        continue;
      }

      records.push({ email, refresh_token: refreshToken });
    }

    return records;
  }

  /**
   * Rewrites the whole file. `snapshot` is read once the write lock is held,
   * so a queued write always persists the newest credentials.
   */
  async save(snapshot: () => AccountRecord[]): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      const records = snapshot();
      const tmpPath = `${this.filePath}.${process.pid}.tmp`;

      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
      await rename(tmpPath, this.filePath);

      this.logger.debug(`Saved ${records.length} account(s) to ${this.filePath}`);
    });
  }

  // Signup exports keep the credential under a few different keys
  private extractRefreshToken(item: Record<string, unknown>): string {
    const direct = item.refresh_token;
    if (typeof direct === 'string' && direct) {
      return direct;
    }
    for (const key of ['cookie_dict', 'key_cookies']) {
      const cookies = item[key];
      const nested = isRecord(cookies) ? cookies.refreshToken : undefined;
      if (typeof nested === 'string' && nested) {
        return nested;
      }
    }
    return '';
  }
}
