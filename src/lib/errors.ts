/**
 * Error taxonomy shared by the API clients.
 *
 * Not-found lookups are never errors: they return null.
 */

export type IntegrationService = 'github' | 'slack' | 'zentao';

/**
 * transport: no response, timeout or unexpected HTTP status
 * auth:      login failed or returned no session token
 * backend:   the API answered but reported an error in its payload
 */
export type IntegrationErrorKind = 'transport' | 'auth' | 'backend';

export abstract class IntegrationError extends Error {
  abstract readonly kind: IntegrationErrorKind;

  constructor(
    public readonly service: IntegrationService,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Non-2xx REST/GraphQL response or transport failure (status 0) */
export class GitHubApiError extends IntegrationError {
  readonly kind = 'transport';

  constructor(message: string, public readonly status: number, options?: ErrorOptions) {
    super('github', message, options);
  }
}

/** GraphQL response carrying an `errors` array */
export class GitHubGraphqlError extends IntegrationError {
  readonly kind = 'backend';

  constructor(message: string, options?: ErrorOptions) {
    super('github', message, options);
  }
}

export class SlackApiError extends IntegrationError {
  readonly kind: IntegrationErrorKind;

  /**
   * @param errorCode - Slack error code from an `ok: false` response, empty
   *   when the request never got one
   */
  constructor(message: string, public readonly errorCode: string, options?: ErrorOptions) {
    super('slack', message, options);
    this.kind = errorCode ? 'backend' : 'transport';
  }
}

export class ZentaoApiError extends IntegrationError {
  readonly kind = 'transport';

  constructor(message: string, public readonly status: number, options?: ErrorOptions) {
    super('zentao', message, options);
  }
}

export class ZentaoAuthError extends IntegrationError {
  readonly kind = 'auth';

  constructor(message: string, options?: ErrorOptions) {
    super('zentao', message, options);
  }
}

/** Raised at start-up when required settings are missing or malformed */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
