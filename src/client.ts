import chalk from 'chalk';

const DEFAULT_TIMEOUT_MS = 30_000;

export type Clock = () => number;

export interface TimedResponse {
  status: number;
  ok: boolean;
  body: string;
  /** Client-side wall-clock seconds, from just before the request to the end of the body. */
  durationSeconds: number;
}

export interface ClientOptions {
  debug?: boolean;
  /** Millisecond clock; defaults to performance.now. */
  now?: Clock;
}

export class RequestTimeoutError extends Error {
  constructor(public timeoutMs: number, url: string) {
    super(`Request timed out after ${timeoutMs / 1000}s: GET ${url}`);
  }
}

export function joinUrl(base: string, path: string): string {
  const trimmedBase = base.replace(/\/+$/, '');
  const trimmedPath = path.replace(/^\/+/, '');
  return trimmedPath ? `${trimmedBase}/${trimmedPath}` : trimmedBase;
}

export class BenchClient {
  private debug: boolean;
  private now: Clock;

  constructor(options: ClientOptions = {}) {
    this.debug = options.debug ?? false;
    this.now = options.now ?? (() => performance.now());
  }

  /** Issues one GET; a timeout or connection error rejects, any HTTP status resolves. */
  async get(url: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<TimedResponse> {
    if (this.debug) {
      console.error(chalk.dim(`→ GET ${url}`));
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const start = this.now();
    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await fetch(url, { method: 'GET', signal: controller.signal });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new RequestTimeoutError(timeoutMs, url);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
    const durationSeconds = (this.now() - start) / 1000;

    if (this.debug) {
      console.error(chalk.dim(`← ${status} in ${durationSeconds.toFixed(3)}s`));
    }

    return { status, ok, body, durationSeconds };
  }
}

export function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
