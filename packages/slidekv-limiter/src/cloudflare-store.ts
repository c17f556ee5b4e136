import { z } from "zod";
import type { KvPutOptions, KvStore } from "./store.js";

/** Workers KV refuses expirations shorter than a minute. */
export const MIN_EXPIRATION_TTL_SECONDS = 60;

const ApiErrorBodySchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

export class KvRequestError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = "KvRequestError";
  }
}

export interface CloudflareKvStoreOptions {
  accountId: string;
  namespaceId: string;
  apiToken: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

/** Workers KV namespace accessed through the Cloudflare REST API. */
export class CloudflareKvStore implements KvStore {
  private readonly namespaceUrl: string;
  private readonly apiToken: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CloudflareKvStoreOptions) {
    const baseUrl = (options.baseUrl ?? "https://api.cloudflare.com/client/v4").replace(/\/+$/, "");
    this.namespaceUrl = `${baseUrl}/accounts/${encodeURIComponent(options.accountId)}`
      + `/storage/kv/namespaces/${encodeURIComponent(options.namespaceId)}`;
    this.apiToken = options.apiToken;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async get(key: string): Promise<string | null> {
    const response = await this.fetchImpl(this.valueUrl(key), {
      headers: { authorization: `Bearer ${this.apiToken}` },
    });
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw await CloudflareKvStore.toError(response);
    }
    return response.text();
  }

  async put(key: string, value: string, options: KvPutOptions = {}): Promise<void> {
    const url = new URL(this.valueUrl(key));
    if (options.expirationTtl !== undefined) {
      const ttl = Math.max(MIN_EXPIRATION_TTL_SECONDS, Math.ceil(options.expirationTtl));
      url.searchParams.set("expiration_ttl", String(ttl));
    }

    const response = await this.fetchImpl(url.toString(), {
      method: "PUT",
      headers: {
        authorization: `Bearer ${this.apiToken}`,
        "content-type": "text/plain; charset=utf-8",
      },
      body: value,
    });
    if (!response.ok) {
      throw await CloudflareKvStore.toError(response);
    }
  }

  private valueUrl(key: string): string {
    return `${this.namespaceUrl}/values/${encodeURIComponent(key)}`;
  }

  private static async toError(response: Response): Promise<KvRequestError> {
    const text = await response.text();
    let details = text;
    try {
      const parsed = ApiErrorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        details = parsed.data.errors.map((entry) => entry.message).join("; ");
      }
    } catch {
      // Plain-text body.
    }
    return new KvRequestError(response.status, details || `KV request failed with status ${response.status}`);
  }
}
