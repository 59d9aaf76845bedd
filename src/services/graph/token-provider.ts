import { randomBytes } from 'crypto';
import { AuthError, TransientError, errorMessage } from '../../lib/errors.js';
import type { TokenSource } from '../../shared/types/api.js';
import {
  createCredentialClient,
  isTokenExpired,
  runConsentFlow,
  type AccessToken,
  type CredentialClient,
  type GraphAppCredentials,
} from './auth.js';

const REFRESH_BUFFER_MS = 5 * 60 * 1000;
const MIN_REFRESH_DELAY_MS = 30 * 1000;

export interface TokenProviderOptions {
  credentials: GraphAppCredentials;
  mode: 'delegated' | 'app';
  /** MSAL cache file (delegated mode) */
  tokenPath: string;
  timeoutMs: number;
  client?: CredentialClient;
  /** Interactive consent; returns an authorization code */
  consent?: (authUrl: string, state: string) => Promise<string>;
  now?: () => number;
}

/**
 * Cached Graph access token.
 *
 * The first call may block on interactive consent (delegated mode with an
 * empty MSAL cache). After that getToken() is a cache read; a timer refreshes
 * the token in the background shortly before it expires.
 */
export class GraphTokenProvider implements TokenSource {
  private token: AccessToken | null = null;
  private inflight: Promise<AccessToken> | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private client: CredentialClient | null;
  private readonly consent: (authUrl: string, state: string) => Promise<string>;
  private readonly now: () => number;

  constructor(private readonly options: TokenProviderOptions) {
    this.client = options.client ?? null;
    this.consent = options.consent ?? runConsentFlow;
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.token && !isTokenExpired(this.token, this.now())) {
      return this.token.accessToken;
    }

    const token = await this.acquire();
    return token.accessToken;
  }

  stop(): void {
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  /** Single-flight: concurrent callers share one acquisition */
  private acquire(): Promise<AccessToken> {
    if (!this.inflight) {
      this.inflight = this.obtain()
        .then((token) => {
          this.token = token;
          this.scheduleRefresh(token);
          return token;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }

  private async obtain(): Promise<AccessToken> {
    const { timeoutMs } = this.options;
    const client = this.credentialClient();

    const cached = await withTimeout(client.acquireSilent(), timeoutMs, 'Token acquisition');
    if (cached) {
      return cached;
    }

    const interactive = client.consent;
    if (!interactive) {
      throw new AuthError('No access token available and no interactive consent for this mode');
    }

    console.log('No cached account, starting OAuth consent flow...');
    const state = randomBytes(16).toString('hex');
    const authUrl = await interactive.authorizeUrl(state);
    const code = await this.consent(authUrl, state);
    const token = await withTimeout(interactive.redeemCode(code), timeoutMs, 'Authorization code redemption');
    console.log('✓ Mailbox authorized');
    return token;
  }

  /** Built lazily so a missing client secret surfaces as a getToken() failure */
  private credentialClient(): CredentialClient {
    if (!this.client) {
      const { mode, credentials, tokenPath } = this.options;
      this.client = createCredentialClient(mode, credentials, tokenPath);
    }
    return this.client;
  }

  private scheduleRefresh(token: AccessToken): void {
    this.stop();

    const delay = Math.max(token.expiresOn - REFRESH_BUFFER_MS - this.now(), MIN_REFRESH_DELAY_MS);
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.acquire().catch((error) => {
        console.error(`[Auth] Background token refresh failed: ${errorMessage(error)}`);
      });
    }, delay);
    this.refreshTimer.unref();
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransientError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
