// Microsoft identity platform sign-in through MSAL, with a file-backed token cache
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import http from 'http';
import { URL } from 'url';
import {
  AuthError as MsalAuthError,
  ConfidentialClientApplication,
  InteractionRequiredAuthError,
  PublicClientApplication,
  type AuthenticationResult,
  type ICachePlugin,
  type TokenCacheContext,
} from '@azure/msal-node';
import open from 'open';
import { AppError, AuthError, TransientError, errorMessage } from '../../lib/errors.js';

const DELEGATED_SCOPES = ['Mail.Read'];
const APP_SCOPES = ['https://graph.microsoft.com/.default'];
const REDIRECT_PORT = 3001;
const REDIRECT_URI = `http://localhost:${REDIRECT_PORT}`;
const CONSENT_TIMEOUT_MS = 5 * 60 * 1000;
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;
const DEFAULT_LIFETIME_MS = 60 * 60 * 1000;

// MSAL error codes that mean "try again later" rather than "sign in again"
const TRANSIENT_MSAL_CODES = new Set([
  'network_error',
  'endpoints_resolution_error',
  'temporarily_unavailable',
  'service_unavailable',
]);

export interface GraphAppCredentials {
  tenantId: string;
  clientId: string;
  clientSecret?: string;
}

export interface AccessToken {
  accessToken: string;
  /** Epoch milliseconds */
  expiresOn: number;
}

/**
 * Interactive half of the delegated flow.
 */
export interface ConsentClient {
  authorizeUrl(state: string): Promise<string>;
  redeemCode(code: string): Promise<AccessToken>;
}

/**
 * What the token provider needs from MSAL. Tests pass a fake.
 */
export interface CredentialClient {
  /**
   * Token from the MSAL cache, refreshed silently when close to expiry.
   * Null when no account is cached and consent is required.
   */
  acquireSilent(): Promise<AccessToken | null>;
  /** Absent for app-only auth */
  consent?: ConsentClient;
}

/**
 * Check if token is expired (with 5 minute buffer)
 */
export function isTokenExpired(token: AccessToken, now: number = Date.now()): boolean {
  return now + EXPIRY_BUFFER_MS >= token.expiresOn;
}

/**
 * MSAL cache plugin persisting the serialized cache to a file (mode 0600).
 */
export function fileCachePlugin(path: string): ICachePlugin {
  return {
    async beforeCacheAccess(context: TokenCacheContext): Promise<void> {
      if (existsSync(path)) {
        context.tokenCache.deserialize(readFileSync(path, 'utf-8'));
      }
    },
    async afterCacheAccess(context: TokenCacheContext): Promise<void> {
      if (!context.cacheHasChanged) return;
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(path, context.tokenCache.serialize(), { mode: 0o600 });
    },
  };
}

/**
 * Translate an MSAL failure into an AppError. Network trouble stays
 * transient; everything MSAL reports about the grant itself is an AuthError.
 */
export function toAuthFailure(error: unknown, label: string): AppError {
  if (error instanceof AppError) return error;

  if (error instanceof MsalAuthError) {
    const detail = error.errorMessage ? `${error.errorCode} - ${error.errorMessage}` : error.errorCode;
    const message = `${label} failed: ${detail}`;
    if (!(error instanceof InteractionRequiredAuthError) && TRANSIENT_MSAL_CODES.has(error.errorCode)) {
      return new TransientError(message, { errorCode: error.errorCode }, { cause: error });
    }
    return new AuthError(message, { errorCode: error.errorCode }, { cause: error });
  }

  return new TransientError(`${label} failed: ${errorMessage(error)}`, undefined, { cause: error });
}

function toAccessToken(result: AuthenticationResult | null, label: string): AccessToken {
  if (!result || !result.accessToken) {
    throw new AuthError(`${label} returned no access token`);
  }
  return {
    accessToken: result.accessToken,
    expiresOn: result.expiresOn ? result.expiresOn.getTime() : Date.now() + DEFAULT_LIFETIME_MS,
  };
}

function authorityFor(credentials: GraphAppCredentials): string {
  return `https://login.microsoftonline.com/${credentials.tenantId}`;
}

/**
 * Delegated sign-in for a single user. With a client secret the app signs
 * in as a confidential client, otherwise as a public one.
 */
export class DelegatedCredentialClient implements CredentialClient, ConsentClient {
  private readonly app: PublicClientApplication | ConfidentialClientApplication;
  readonly consent: ConsentClient = this;

  constructor(credentials: GraphAppCredentials, tokenPath: string) {
    const cache = { cachePlugin: fileCachePlugin(tokenPath) };
    this.app = credentials.clientSecret
      ? new ConfidentialClientApplication({
          auth: {
            clientId: credentials.clientId,
            authority: authorityFor(credentials),
            clientSecret: credentials.clientSecret,
          },
          cache,
        })
      : new PublicClientApplication({
          auth: { clientId: credentials.clientId, authority: authorityFor(credentials) },
          cache,
        });
  }

  async acquireSilent(): Promise<AccessToken | null> {
    try {
      const [account] = await this.app.getTokenCache().getAllAccounts();
      if (!account) return null;
      const result = await this.app.acquireTokenSilent({ account, scopes: DELEGATED_SCOPES });
      return toAccessToken(result, 'Token refresh');
    } catch (error) {
      throw toAuthFailure(error, 'Token refresh');
    }
  }

  async authorizeUrl(state: string): Promise<string> {
    try {
      return await this.app.getAuthCodeUrl({ scopes: DELEGATED_SCOPES, redirectUri: REDIRECT_URI, state });
    } catch (error) {
      throw toAuthFailure(error, 'Authorization URL');
    }
  }

  async redeemCode(code: string): Promise<AccessToken> {
    try {
      const result = await this.app.acquireTokenByCode({ code, scopes: DELEGATED_SCOPES, redirectUri: REDIRECT_URI });
      return toAccessToken(result, 'Authorization code redemption');
    } catch (error) {
      throw toAuthFailure(error, 'Authorization code redemption');
    }
  }
}

/**
 * App-only sign-in (client credentials). MSAL keeps the token in memory.
 */
export class AppCredentialClient implements CredentialClient {
  private readonly app: ConfidentialClientApplication;

  constructor(credentials: GraphAppCredentials) {
    if (!credentials.clientSecret) {
      throw new AuthError('Client secret is required for app authentication');
    }
    this.app = new ConfidentialClientApplication({
      auth: {
        clientId: credentials.clientId,
        authority: authorityFor(credentials),
        clientSecret: credentials.clientSecret,
      },
    });
  }

  async acquireSilent(): Promise<AccessToken> {
    try {
      const result = await this.app.acquireTokenByClientCredential({ scopes: APP_SCOPES });
      return toAccessToken(result, 'Client credentials grant');
    } catch (error) {
      throw toAuthFailure(error, 'Client credentials grant');
    }
  }
}

export function createCredentialClient(
  mode: 'delegated' | 'app',
  credentials: GraphAppCredentials,
  tokenPath: string
): CredentialClient {
  return mode === 'app' ? new AppCredentialClient(credentials) : new DelegatedCredentialClient(credentials, tokenPath);
}

/**
 * Run browser-based OAuth consent flow
 * Opens browser, starts local server to receive callback, returns authorization code
 */
export async function runConsentFlow(authUrl: string, state: string): Promise<string> {
  console.log('\n📧 Mailbox Authorization Required');
  console.log('Opening browser for consent...');
  console.log('If browser does not open, visit this URL:');
  console.log(authUrl);
  console.log();

  await open(authUrl);

  // Start local server to receive callback
  return new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      if (!req.url) {
        return;
      }

      const url = new URL(req.url, REDIRECT_URI);
      const code = url.searchParams.get('code');
      const error = url.searchParams.get('error');

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/html' });
        res.end(`<h1>Authorization Failed</h1><p>Error: ${error}</p>`);
        finish();
        reject(new AuthError(`OAuth error: ${error}`));
        return;
      }

      if (code && url.searchParams.get('state') === state) {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(`
          <h1>Authorization Successful!</h1>
          <p>You can close this window and return to the terminal.</p>
        `);
        finish();
        resolve(code);
        return;
      }

      res.writeHead(404);
      res.end('Not found');
    });

    const timer = setTimeout(() => {
      server.close();
      reject(new AuthError('OAuth consent flow timed out after 5 minutes'));
    }, CONSENT_TIMEOUT_MS);

    function finish() {
      clearTimeout(timer);
      server.close();
    }

    server.listen(REDIRECT_PORT, () => {
      console.log(`Listening for OAuth callback on ${REDIRECT_URI}...`);
    });
  });
}
