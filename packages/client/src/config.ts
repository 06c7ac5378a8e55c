import type { Logger } from 'pino';
import { z } from 'zod';
import {
  apiTokenAuth,
  basicAuth,
  bearerAuth,
  type Credential,
} from './credentials.js';
import { ConfigurationError } from './errors/index.js';

export const ZENDESK_HOST = 'zendesk.com';

/**
 * Tenant prefix of the API host: lowercase alphanumerics and hyphens,
 * at least three characters, no leading or trailing hyphen
 */
export const subdomainSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9-]+[a-z0-9]$/, 'invalid subdomain');

export const endpointUrlSchema = z.string().url();

/**
 * Configuration options for ZendeskClient
 */
export interface ClientConfig {
  /**
   * Account subdomain, e.g. 'acme' for https://acme.zendesk.com/api/v2
   */
  subdomain?: string;

  /**
   * Full endpoint URL, used instead of the subdomain without validation.
   * Mainly for pointing the client at a mock server.
   */
  endpointUrl?: string;

  /**
   * Credential applied to every request; omit for unauthenticated calls
   */
  credential?: Credential;

  /**
   * Extra headers sent on every request, overriding defaults of the same name
   */
  headers?: Record<string, string>;

  /**
   * Request timeout in milliseconds. No timeout unless set; callers
   * usually cancel through `RequestOptions.signal` instead.
   */
  timeout?: number;

  /**
   * pino logger for request diagnostics. Silent by default.
   */
  logger?: Logger;

  /**
   * Custom fetch implementation handed to the transport
   */
  fetch?: typeof globalThis.fetch;
}

/**
 * Build the base endpoint for a subdomain
 * @throws {ConfigurationError} if the subdomain does not match the allowed charset
 */
export function endpointForSubdomain(subdomain: string): string {
  const result = subdomainSchema.safeParse(subdomain);
  if (!result.success) {
    throw new ConfigurationError(`${subdomain} is invalid subdomain`, result.error);
  }
  return `https://${result.data}.${ZENDESK_HOST}/api/v2`;
}

/**
 * Validate an override endpoint URL and strip any trailing slash
 * @throws {ConfigurationError} if the value is not an absolute URL
 */
export function normalizeEndpointUrl(endpointUrl: string): string {
  const result = endpointUrlSchema.safeParse(endpointUrl);
  if (!result.success) {
    throw new ConfigurationError(`${endpointUrl} is invalid endpoint URL`, result.error);
  }
  return result.data.replace(/\/+$/, '');
}

/**
 * Resolve the base endpoint from config; the override URL wins over the subdomain
 */
export function resolveEndpoint(
  config: Pick<ClientConfig, 'subdomain' | 'endpointUrl'>,
): string | undefined {
  if (config.endpointUrl !== undefined) {
    return normalizeEndpointUrl(config.endpointUrl);
  }
  if (config.subdomain !== undefined) {
    return endpointForSubdomain(config.subdomain);
  }
  return undefined;
}

// =============================================================================
// Environment
// =============================================================================

export const EnvSchema = z.object({
  ZENDESK_SUBDOMAIN: subdomainSchema.optional(),
  ZENDESK_ENDPOINT_URL: endpointUrlSchema.optional(),
  ZENDESK_EMAIL: z.string().min(1).optional(),
  ZENDESK_API_TOKEN: z.string().min(1).optional(),
  ZENDESK_PASSWORD: z.string().min(1).optional(),
  ZENDESK_OAUTH_TOKEN: z.string().min(1).optional(),
  ZENDESK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function credentialFromEnv(env: EnvConfig): Credential | undefined {
  if (env.ZENDESK_OAUTH_TOKEN) {
    return bearerAuth(env.ZENDESK_OAUTH_TOKEN);
  }
  if (!env.ZENDESK_EMAIL) {
    return undefined;
  }
  if (env.ZENDESK_API_TOKEN) {
    return apiTokenAuth(env.ZENDESK_EMAIL, env.ZENDESK_API_TOKEN);
  }
  if (env.ZENDESK_PASSWORD) {
    return basicAuth(env.ZENDESK_EMAIL, env.ZENDESK_PASSWORD);
  }
  return undefined;
}

/**
 * Load client configuration from environment variables.
 *
 * An OAuth token takes precedence over an API token, which takes
 * precedence over a password.
 *
 * @throws {ConfigurationError} if a variable is present but invalid
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid environment: ${details}`, result.error);
  }

  const parsed = result.data;
  const config: ClientConfig = {};
  if (parsed.ZENDESK_SUBDOMAIN !== undefined) {
    config.subdomain = parsed.ZENDESK_SUBDOMAIN;
  }
  if (parsed.ZENDESK_ENDPOINT_URL !== undefined) {
    config.endpointUrl = parsed.ZENDESK_ENDPOINT_URL;
  }
  const credential = credentialFromEnv(parsed);
  if (credential) {
    config.credential = credential;
  }
  if (parsed.ZENDESK_TIMEOUT_MS !== undefined) {
    config.timeout = parsed.ZENDESK_TIMEOUT_MS;
  }
  return config;
}
