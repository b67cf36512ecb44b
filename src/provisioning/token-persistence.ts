import { EnvironmentStore } from '../env/environment-store';
import { AdminIdentity, TokenProvisioner } from './types';

export interface PersistTarget {
  store: EnvironmentStore;
  envFile: string;
  tokenKey: string;
}

/**
 * Mints a token and writes it to the environment file. The raw token is not
 * returned; readers go through the store.
 */
export async function provisionAndPersist(
  provisioner: TokenProvisioner,
  admin: AdminIdentity,
  target: PersistTarget
): Promise<void> {
  const token = await provisioner.provision(admin);
  await target.store.upsert(target.envFile, target.tokenKey, token, { quoting: 'always' });
}
