// ============================================================================
// SECRET STORE
// Resolves flight data provider credentials by logical secret name
// ============================================================================

import { logger } from "../utils/logger.js";
import { AccessDeniedError, SecretNotFoundError } from "../errors/index.js";
import type { ProviderCredentials } from "../types/lounge.types.js";

export interface SecretStore {
  /**
   * Rejects with SecretNotFoundError or AccessDeniedError
   */
  getSecret(name: string): Promise<ProviderCredentials>;
}

export interface EnvSecretStoreOptions {
  /** The only secret name this store will serve */
  secretName: string;
  clientId?: string;
  clientSecret?: string;
}

/**
 * Serves a single secret from process configuration
 */
export class EnvSecretStore implements SecretStore {
  constructor(private readonly options: EnvSecretStoreOptions) {}

  async getSecret(name: string): Promise<ProviderCredentials> {
    if (name !== this.options.secretName) {
      logger.warn({ secretName: name }, "Requested secret is not managed by this store");
      throw new AccessDeniedError(name, "secret is not managed by this store");
    }

    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new SecretNotFoundError(name);
    }

    return { clientId, clientSecret };
  }
}

/**
 * In-memory secrets, keyed by name
 */
export class StaticSecretStore implements SecretStore {
  private readonly secrets: Map<string, ProviderCredentials>;

  constructor(secrets: Record<string, ProviderCredentials>) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async getSecret(name: string): Promise<ProviderCredentials> {
    const secret = this.secrets.get(name);
    if (!secret) {
      throw new SecretNotFoundError(name);
    }
    return { ...secret };
  }
}
