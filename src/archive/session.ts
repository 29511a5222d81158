import { load } from "cheerio";
import { fetch, getSetCookies, type Cookie, type Dispatcher, type Response } from "undici";
import type { Credentials } from "../config";
import type { Logger } from "../observability";
import { AuthenticationError, errorMessage } from "./errors";

export interface SessionResponse {
  readonly status: number;
  /** Final URL after redirects. */
  readonly url: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface DigestSession {
  get(url: string): Promise<SessionResponse>;
  close(): Promise<void>;
}

export interface ArchiveSessionOptions {
  authUrl: string;
  userAgent: string;
  /** 0 disables the per-request timeout. */
  requestTimeoutMs: number;
  verifyLogin: boolean;
  dispatcher: Dispatcher;
  /** Whether closing the session also closes `dispatcher`. */
  ownsDispatcher: boolean;
  logger: Logger;
}

const MAX_LOGIN_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function formatCookieHeader(jar: ReadonlyMap<string, string>): string {
  return [...jar].map(([name, value]) => `${name}=${value}`).join("; ");
}

function timeoutSignal(timeoutMs: number): AbortSignal | undefined {
  return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}

/** True when the page still asks for a password, i.e. the login did not take. */
export function isLoginForm(html: string): boolean {
  const $ = load(html);
  return $("input[type='password']").length > 0;
}

/**
 * Cookie-carrying HTTP session against the archive. Authenticates once in
 * {@link ArchiveSession.open}; every later `get` presents the captured cookies
 * over the same connection dispatcher.
 */
export class ArchiveSession implements DigestSession {
  private readonly options: ArchiveSessionOptions;
  private readonly cookies: ReadonlyMap<string, string>;
  private closed = false;

  private constructor(options: ArchiveSessionOptions, cookies: ReadonlyMap<string, string>) {
    this.options = options;
    this.cookies = cookies;
  }

  static async open(credentials: Credentials, options: ArchiveSessionOptions): Promise<ArchiveSession> {
    const { logger } = options;
    const cookies = new Map<string, string>();
    logger.info("auth_start", { url: options.authUrl });

    let login: { status: number; body: string };
    try {
      login = await postLogin(credentials, options, cookies);
    } catch (error) {
      await releaseDispatcher(options);
      throw new AuthenticationError(`Login request to ${options.authUrl} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (options.verifyLogin) {
      const rejection =
        login.status >= 400
          ? `login endpoint answered HTTP ${login.status}`
          : isLoginForm(login.body)
            ? "login form returned again, check username and password"
            : undefined;
      if (rejection) {
        await releaseDispatcher(options);
        throw new AuthenticationError(`Login to ${options.authUrl} failed: ${rejection}`);
      }
    }

    if (cookies.size === 0) {
      logger.warn("auth_no_session_cookie", { url: options.authUrl, status: login.status });
    }
    logger.info("auth_complete", { url: options.authUrl, status: login.status, cookies: cookies.size });
    return new ArchiveSession(options, cookies);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get cookieHeader(): string {
    return formatCookieHeader(this.cookies);
  }

  async get(url: string): Promise<SessionResponse> {
    if (this.closed) {
      throw new Error(`Session is closed, cannot fetch ${url}`);
    }

    return fetch(url, {
      method: "GET",
      headers: this.requestHeaders(),
      redirect: "follow",
      dispatcher: this.options.dispatcher,
      signal: timeoutSignal(this.options.requestTimeoutMs),
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await releaseDispatcher(this.options);
    this.options.logger.debug("session_closed");
  }

  private requestHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "user-agent": this.options.userAgent,
      accept: "text/html,application/xhtml+xml",
    };
    if (this.cookies.size > 0) {
      headers.cookie = this.cookieHeader;
    }
    return headers;
  }
}

async function releaseDispatcher(options: ArchiveSessionOptions): Promise<void> {
  if (options.ownsDispatcher) {
    await options.dispatcher.close();
  }
}

function isExpired(cookie: Cookie, now: number): boolean {
  if (cookie.maxAge !== undefined && cookie.maxAge <= 0) {
    return true;
  }
  if (cookie.expires === undefined) {
    return false;
  }
  const expiresAt = cookie.expires instanceof Date ? cookie.expires.getTime() : cookie.expires;
  return expiresAt <= now;
}

function captureCookies(response: Response, jar: Map<string, string>): void {
  const now = Date.now();
  for (const cookie of getSetCookies(response.headers)) {
    if (isExpired(cookie, now)) {
      jar.delete(cookie.name);
    } else {
      jar.set(cookie.name, cookie.value);
    }
  }
}

async function postLogin(
  credentials: Credentials,
  options: ArchiveSessionOptions,
  jar: Map<string, string>,
): Promise<{ status: number; body: string }> {
  const baseHeaders = { "user-agent": options.userAgent };
  let target = options.authUrl;
  let response = await fetch(target, {
    method: "POST",
    headers: baseHeaders,
    body: new URLSearchParams({ username: credentials.username, password: credentials.password }),
    redirect: "manual",
    dispatcher: options.dispatcher,
    signal: timeoutSignal(options.requestTimeoutMs),
  });

  // Hops are followed by hand so that cookies set on a redirect are not lost.
  for (let hop = 0; ; hop += 1) {
    captureCookies(response, jar);
    const location = response.headers.get("location");
    if (!REDIRECT_STATUSES.has(response.status) || !location) {
      break;
    }
    if (hop >= MAX_LOGIN_REDIRECTS) {
      throw new Error(`more than ${MAX_LOGIN_REDIRECTS} redirects after login`);
    }

    await response.arrayBuffer();
    target = new URL(location, target).toString();
    options.logger.debug("auth_redirect", { url: target, status: response.status });
    const cookie = formatCookieHeader(jar);
    response = await fetch(target, {
      method: "GET",
      headers: cookie ? { ...baseHeaders, cookie } : baseHeaders,
      redirect: "manual",
      dispatcher: options.dispatcher,
      signal: timeoutSignal(options.requestTimeoutMs),
    });
  }

  return { status: response.status, body: await response.text() };
}
