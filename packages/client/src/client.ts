import { type Logger, pino } from 'pino';
import {
  type ClientConfig,
  endpointForSubdomain,
  normalizeEndpointUrl,
  resolveEndpoint,
} from './config.js';
import type { Credential } from './credentials.js';
import { ConfigurationError } from './errors/index.js';
import { GroupsResource, UsersResource } from './resources/index.js';
import {
  buildHeaders,
  HttpPipeline,
  type RequestOptions,
  type Requester,
} from './utils/index.js';

/**
 * Main Zendesk API client
 *
 * @example
 * ```typescript
 * const client = new ZendeskClient({
 *   subdomain: 'acme',
 *   credential: apiTokenAuth('agent@example.com', 'your-api-token'),
 * });
 *
 * const group = await client.groups.create({ name: 'Support' });
 *
 * for await (const g of client.groups.iterate()) {
 *   console.log(g.name);
 * }
 *
 * // Endpoints without a typed method
 * const raw = await client.get('/tickets/count.json');
 * ```
 */
export class ZendeskClient implements Requester {
  private endpoint: string | undefined;
  private credential: Credential | undefined;
  private readonly headers: Record<string, string>;
  private readonly timeout: number | undefined;
  private readonly fetchImpl: typeof globalThis.fetch | undefined;
  private readonly logger: Logger;

  /**
   * Built on the first request; from then on the configuration is frozen
   */
  private pipeline: HttpPipeline | undefined;

  /**
   * Groups API resource
   */
  public readonly groups: GroupsResource;

  /**
   * Users API resource
   */
  public readonly users: UsersResource;

  /**
   * Create a new Zendesk API client
   *
   * @throws {ConfigurationError} if the subdomain or endpoint URL is invalid
   */
  constructor(config: ClientConfig = {}) {
    this.endpoint = resolveEndpoint(config);
    this.credential = config.credential;
    this.headers = { ...config.headers };
    this.timeout = config.timeout;
    this.fetchImpl = config.fetch;
    this.logger =
      config.logger ?? pino({ name: 'zendesk-api-client', level: 'silent' });

    this.groups = new GroupsResource(this);
    this.users = new UsersResource(this);
  }

  /**
   * Point the client at `https://{subdomain}.zendesk.com/api/v2`
   * @throws {ConfigurationError} if the subdomain is invalid or a request was already sent
   */
  setSubdomain(subdomain: string): void {
    this.assertMutable();
    this.endpoint = endpointForSubdomain(subdomain);
  }

  /**
   * Replace the full endpoint URL without subdomain validation.
   * Mainly used to point at a mock API server.
   */
  setEndpointUrl(endpointUrl: string): void {
    this.assertMutable();
    this.endpoint = normalizeEndpointUrl(endpointUrl);
  }

  /**
   * Set the credential applied to every request; `undefined` sends requests unauthenticated
   */
  setCredential(credential: Credential | undefined): void {
    this.assertMutable();
    this.credential = credential;
  }

  /**
   * Set a header sent on every request, replacing any default of the same name
   */
  setHeader(name: string, value: string): void {
    this.assertMutable();
    this.headers[name] = value;
  }

  /**
   * GET an arbitrary path; succeeds only on 200
   */
  async get(path: string, options?: RequestOptions): Promise<Uint8Array> {
    return this.getPipeline().get(path, options);
  }

  /**
   * POST a JSON body; succeeds on 200 or 201
   */
  async post(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array> {
    return this.getPipeline().post(path, data, options);
  }

  /**
   * PUT a JSON body; succeeds on 200 or 204
   */
  async put(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array> {
    return this.getPipeline().put(path, data, options);
  }

  /**
   * PATCH a JSON body; succeeds on 200 or 204
   */
  async patch(path: string, data: unknown, options?: RequestOptions): Promise<Uint8Array> {
    return this.getPipeline().patch(path, data, options);
  }

  /**
   * DELETE with an optional JSON body; succeeds only on 204
   */
  async delete(path: string, data?: unknown, options?: RequestOptions): Promise<void> {
    return this.getPipeline().delete(path, data, options);
  }

  private assertMutable(): void {
    if (this.pipeline) {
      throw new ConfigurationError(
        'Client configuration cannot change after the first request',
      );
    }
  }

  private getPipeline(): HttpPipeline {
    if (this.pipeline) {
      return this.pipeline;
    }
    if (this.endpoint === undefined) {
      throw new ConfigurationError(
        'No endpoint configured: set a subdomain or an endpoint URL',
      );
    }

    this.pipeline = new HttpPipeline({
      endpoint: this.endpoint,
      headers: buildHeaders(this.headers, this.credential),
      logger: this.logger,
      timeout: this.timeout,
      fetch: this.fetchImpl,
    });
    return this.pipeline;
  }
}
