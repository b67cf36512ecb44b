// Provisioning-specific types
export interface AdminIdentity {
  email: string;
  password?: string;
}

export interface TokenProvisioner {
  readonly strategy: string;
  /**
   * Mint a fresh bearer token owned by `admin`.
   * @throws RecreateError (ProvisionFailed)
   */
  provision(admin: AdminIdentity): Promise<string>;
}
