import { requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';

export interface GoogleAuthOptions {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  /** Request-per-second cap handed to every API call. */
  rps?: number;
}

interface GoogleTokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
  scope?: string;
}

const TOKEN_URL = 'https://oauth2.googleapis.com/token';

/**
 * Refresh-token grant with a cached access token. One instance is shared by
 * the Gmail and Calendar clients of a run.
 */
export class GoogleAuth {
  readonly fetcher: FetchLike;
  private accessToken?: { token: string; expMs: number };

  constructor(private opts: GoogleAuthOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  async getAccessToken(): Promise<string> {
    const now = Date.now();
    if (this.accessToken && this.accessToken.expMs - 30_000 > now) return this.accessToken.token;

    const body = new URLSearchParams({
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
      refresh_token: this.opts.refreshToken,
      grant_type: 'refresh_token',
    });

    const res = await this.fetcher(TOKEN_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body,
    });

    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new Error(`Google token refresh failed: HTTP ${res.status} ${txt}`);
    }

    const json = (await res.json()) as GoogleTokenResponse;
    this.accessToken = { token: json.access_token, expMs: now + json.expires_in * 1000 };
    return json.access_token;
  }

  /** Authorized JSON call against `base + path`. */
  async api<T>(base: string, path: string, init: JsonRequestOptions = {}): Promise<T | undefined> {
    const token = await this.getAccessToken();
    return requestJson<T>(
      `${base}${path}`,
      { rps: this.opts.rps, ...init, headers: { authorization: `Bearer ${token}`, ...(init.headers ?? {}) } },
      this.fetcher,
    );
  }
}
