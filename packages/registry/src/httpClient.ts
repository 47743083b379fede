import {
  DEFAULT_REGISTRY,
  NetworkError,
  RegistryUnavailableError,
  logger as defaultLogger,
  withRetry,
} from "@burrow/common";
import type { Logger } from "@burrow/common";

import type { PackageVersions, RegistryClient } from "./types";
import { validatePackument } from "./validate";

export interface HttpRegistryClientOptions {
  /**
   * @default https://registry.npmjs.org
   */
  registry?: string;
  /**
   * Timeout of a single request. 0 disables it.
   */
  timeoutMs?: number;
  /**
   * Attempts for a metadata request. Tarball downloads are attempted once, the
   * installer retries them.
   */
  retries?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

const ACCEPT =
  "application/vnd.npm.install-v1+json; q=1.0, application/json; q=0.8, */*";

export function packageUrl(registry: string, name: string): string {
  const base = registry.replace(/\/+$/, "");
  const encoded = name.startsWith("@") ? name.replace("/", "%2f") : name;
  return `${base}/${encoded}`;
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Runs `fetch` with a per-request timeout, also honoring an outer signal.
 */
async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: { headers?: Record<string, string> },
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  const controller = new AbortController();
  const abort = () => controller.abort();
  const timer =
    timeoutMs > 0 ? setTimeout(abort, timeoutMs) : undefined;
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", abort, { once: true });
  }
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } catch (e) {
    if (controller.signal.aborted && !signal?.aborted) {
      throw new NetworkError(url, `Request to ${url} timed out after ${timeoutMs}ms`, {
        cause: e,
      });
    }
    throw new NetworkError(url, `Request to ${url} failed`, { cause: e });
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    signal?.removeEventListener("abort", abort);
  }
}

export class HttpRegistryClient implements RegistryClient {
  private readonly registry: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRegistryClientOptions = {}) {
    this.registry = options.registry ?? DEFAULT_REGISTRY;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 4_000;
    this.logger = options.logger ?? defaultLogger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getVersions(name: string): Promise<PackageVersions> {
    const url = packageUrl(this.registry, name);
    const document = await withRetry(
      async () => {
        let response: Response;
        try {
          response = await fetchWithTimeout(
            this.fetchImpl,
            url,
            { headers: { accept: ACCEPT } },
            this.timeoutMs
          );
        } catch (e) {
          throw new RegistryUnavailableError(
            name,
            `Could not reach the registry for "${name}"`,
            { url, cause: e }
          );
        }
        if (!response.ok) {
          throw new RegistryUnavailableError(
            name,
            response.status === 404
              ? `Package "${name}" was not found in ${this.registry}`
              : `Registry responded ${response.status} for "${name}"`,
            { status: response.status, url }
          );
        }
        try {
          const body: unknown = await response.json();
          return body;
        } catch (e) {
          throw new RegistryUnavailableError(
            name,
            `Registry returned invalid JSON for "${name}"`,
            { url, cause: e }
          );
        }
      },
      {
        attempts: this.retries,
        baseDelayMs: this.retryDelayMs,
        maxDelayMs: this.maxRetryDelayMs,
        shouldRetry: (error) =>
          !(error instanceof RegistryUnavailableError) ||
          error.status === undefined ||
          isTransientStatus(error.status),
        onRetry: (error, attempt, delay) =>
          this.logger.debug(
            `Retrying metadata of ${name} in ${delay}ms (attempt ${attempt}): ${String(
              error
            )}`
          ),
      }
    );
    return validatePackument(name, document);
  }

  async fetchTarball(
    url: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<Uint8Array> {
    const response = await fetchWithTimeout(
      this.fetchImpl,
      url,
      {},
      this.timeoutMs,
      options.signal
    );
    if (!response.ok) {
      throw new NetworkError(url, `Download of ${url} failed with status ${response.status}`, {
        status: response.status,
      });
    }
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (e) {
      throw new NetworkError(url, `Download of ${url} was interrupted`, { cause: e });
    }
  }
}
