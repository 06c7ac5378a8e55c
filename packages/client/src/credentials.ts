/**
 * HTTP Basic identity: email (or `email/token`) and a password or API token
 */
export interface BasicCredential {
  readonly type: 'basic';
  readonly email: string;
  readonly secret: string;
}

/**
 * OAuth access token sent as `Authorization: Bearer <token>`
 */
export interface BearerCredential {
  readonly type: 'bearer';
  readonly token: string;
}

export type Credential = BasicCredential | BearerCredential;

/**
 * Email + password basic authentication
 */
export function basicAuth(email: string, password: string): BasicCredential {
  return Object.freeze({ type: 'basic', email, secret: password });
}

/**
 * Email + API token; Zendesk expects the username `<email>/token`
 */
export function apiTokenAuth(email: string, token: string): BasicCredential {
  return Object.freeze({ type: 'basic', email: `${email}/token`, secret: token });
}

/**
 * OAuth bearer token authentication
 */
export function bearerAuth(token: string): BearerCredential {
  return Object.freeze({ type: 'bearer', token });
}

/**
 * Value of the Authorization header for a credential
 */
export function authorizationHeader(credential: Credential): string {
  switch (credential.type) {
    case 'bearer':
      return `Bearer ${credential.token}`;
    case 'basic': {
      const encoded = Buffer.from(
        `${credential.email}:${credential.secret}`,
        'utf8',
      ).toString('base64');
      return `Basic ${encoded}`;
    }
  }
}

/**
 * Set the Authorization header on outgoing headers. No credential means
 * the request goes out unauthenticated.
 */
export function applyCredential(
  headers: Headers,
  credential: Credential | undefined,
): void {
  if (credential) {
    headers.set('Authorization', authorizationHeader(credential));
  }
}
