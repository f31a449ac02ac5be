import { SingleFlight } from '../cache/single-flight.js';
import type { TokenExchangeClient } from '../oauth/types.js';
import { AuthProviderConfigurationError } from '../utils/errors.js';

const DEFAULT_CLIENT_KEY = 'default';

/** Builds (and typically discovers metadata for) the client of one zone. */
export type ClientBuilder = (zoneId: string | undefined) => Promise<TokenExchangeClient>;

/**
 * Prepends `zoneId` as a subdomain of `baseUrl`, keeping any non-default port.
 *
 * `createZoneScopedUrl('https://auth.example.com', 'acme')` →
 * `https://acme.auth.example.com`
 */
export function createZoneScopedUrl(baseUrl: string, zoneId: string): string {
  // Zone ids arrive from requests; only a single DNS label is allowed
  if (!/^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/.test(zoneId)) {
    throw new AuthProviderConfigurationError(`Invalid zone id: ${zoneId}`);
  }
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    throw new AuthProviderConfigurationError(`Invalid base URL: ${baseUrl}`);
  }
  // URL.port is '' for the scheme's default port
  const portPart = url.port ? `:${url.port}` : '';
  return `${url.protocol}//${zoneId}.${url.hostname}${portPart}`;
}

/**
 * Lazily built, process-wide map of zone id → exchange client.
 *
 * Each client is built at most once, even under concurrent first use. A
 * failed build is not remembered: the next caller retries.
 */
export class ZoneClientRegistry {
  private readonly clients = new Map<string, TokenExchangeClient>();
  private readonly builds = new SingleFlight<string, TokenExchangeClient>();

  constructor(
    private readonly build: ClientBuilder,
    private readonly multiZone: boolean
  ) {}

  async getClient(zoneId?: string): Promise<TokenExchangeClient> {
    const key = this.keyFor(zoneId);
    return this.builds.run(
      key,
      () => this.clients.get(key),
      async () => {
        const client = await this.build(this.multiZone ? zoneId : undefined);
        this.clients.set(key, client);
        return client;
      }
    );
  }

  /** Already-built client, without triggering a build. */
  peek(zoneId?: string): TokenExchangeClient | undefined {
    return this.clients.get(this.keyFor(zoneId));
  }

  size(): number {
    return this.clients.size;
  }

  clear(): void {
    this.clients.clear();
  }

  private keyFor(zoneId?: string): string {
    return this.multiZone && zoneId ? `zone:${zoneId}` : DEFAULT_CLIENT_KEY;
  }
}
