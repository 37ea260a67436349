/**
 * Builds authenticated storage clients from job credentials.
 */
import { ConfigurationError } from "../core/exceptions.js";
import type { TokensAndUrlAuthData } from "../core/types.js";
import { DriveClient, type StorageClient } from "./client.js";

export interface CredentialFactory {
  createClient(authData: TokensAndUrlAuthData): StorageClient | Promise<StorageClient>;
}

export interface DriveCredentialFactoryOptions {
  apiBaseUrl?: string;
  uploadBaseUrl?: string;
  fetch?: typeof fetch;
}

export class DriveCredentialFactory implements CredentialFactory {
  private opts: DriveCredentialFactoryOptions;

  constructor(opts: DriveCredentialFactoryOptions = {}) {
    this.opts = opts;
  }

  createClient(authData: TokensAndUrlAuthData): StorageClient {
    if (!authData.accessToken) {
      throw new ConfigurationError("An access token is required to reach Drive");
    }
    return new DriveClient({
      accessToken: authData.accessToken,
      apiBaseUrl: this.opts.apiBaseUrl,
      uploadBaseUrl: this.opts.uploadBaseUrl,
      fetch: this.opts.fetch,
    });
  }
}
