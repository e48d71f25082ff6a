import type { Logger } from "./logger.js";

/**
 * Best-effort lookup of human-readable names for selectors. Implementations
 * resolve to `undefined` instead of rejecting.
 */
export interface SelectorResolver {
  /** Resolve a 4-byte function selector (hex, with or without 0x). */
  resolveFunctionSelector(selector: string): Promise<string | undefined>;
  /** Resolve a 32-byte event topic (hex, with or without 0x). */
  resolveEventSelector(topic: string): Promise<string | undefined>;
}

/** Resolves nothing. */
export const nullResolver: SelectorResolver = {
  resolveFunctionSelector: async () => undefined,
  resolveEventSelector: async () => undefined,
};

export const DEFAULT_SELECTOR_URL = "https://api.openchain.xyz";
export const DEFAULT_SELECTOR_TIMEOUT_MS = 5_000;

export interface OpenChainResolverOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Warnings about failed lookups go here. */
  logger?: Logger;
  fetch?: typeof fetch;
}

type SelectorKind = "function" | "event";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function normalizeSelector(selector: string): string {
  const lower = selector.toLowerCase();
  return lower.startsWith("0x") ? lower : "0x" + lower;
}

/**
 * Pull the first signature name out of a signature-database lookup response:
 * `{ ok: true, result: { function: { "0x..": [{ name, filtered }] } } }`.
 */
function pickSignature(
  body: unknown,
  kind: SelectorKind,
  selector: string
): string | undefined {
  if (!isRecord(body) || body.ok !== true || !isRecord(body.result)) {
    return undefined;
  }
  const byKind = body.result[kind];
  if (!isRecord(byKind)) return undefined;
  const matches = byKind[selector];
  if (!Array.isArray(matches)) return undefined;

  for (const match of matches) {
    if (isRecord(match) && typeof match.name === "string" && match.filtered !== true) {
      return match.name;
    }
  }
  return undefined;
}

/** Resolver backed by the openchain.xyz signature database. */
export class OpenChainResolver implements SelectorResolver {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;
  private readonly fetchImpl: typeof fetch;
  // Keyed by `${kind}:${selector}`; in-flight lookups are shared.
  private readonly cache = new Map<string, Promise<string | undefined>>();

  constructor(options: OpenChainResolverOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SELECTOR_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SELECTOR_TIMEOUT_MS;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  resolveFunctionSelector(selector: string): Promise<string | undefined> {
    return this.resolve("function", normalizeSelector(selector));
  }

  resolveEventSelector(topic: string): Promise<string | undefined> {
    return this.resolve("event", normalizeSelector(topic));
  }

  private resolve(kind: SelectorKind, selector: string): Promise<string | undefined> {
    const cacheKey = `${kind}:${selector}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const pending = this.lookup(kind, selector).catch((e: unknown) => {
      // Failures are not cached so a later render can retry.
      this.cache.delete(cacheKey);
      const reason = e instanceof Error ? e.message : String(e);
      this.logger?.warn(`Could not resolve ${kind} selector ${selector}: ${reason}`);
      return undefined;
    });
    this.cache.set(cacheKey, pending);
    return pending;
  }

  private async lookup(kind: SelectorKind, selector: string): Promise<string | undefined> {
    const url = `${this.baseUrl}/signature-database/v1/lookup?${kind}=${selector}&filter=true`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      const body: unknown = await response.json();
      return pickSignature(body, kind, selector);
    } catch (e) {
      if (controller.signal.aborted) {
        throw new Error(`timed out after ${this.timeoutMs}ms`);
      }
      throw e;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
