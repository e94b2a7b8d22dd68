/**
 * Credential boundary.
 * Token acquisition and refresh live outside this package; the client only
 * asks for ready-to-use headers before each call.
 */

export interface CredentialProvider {
  /** Headers to attach to the next request. */
  getAuthHeaders(): Promise<Record<string, string>>;
}

/** Bearer token that never changes for the lifetime of the provider. */
export class StaticTokenCredentials implements CredentialProvider {
  constructor(private readonly token: string) {}

  async getAuthHeaders(): Promise<Record<string, string>> {
    return {
      Authorization: `Bearer ${this.token}`,
      Accept: 'application/json',
    };
  }
}
