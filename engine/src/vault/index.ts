export {
  describeVault,
  deserializeVault,
  invertMappings,
  loadVault,
  recordMappings,
  saveVault,
  serializeVault,
} from './vault.js';
export type { DeserializedVault, SerializeOptions, VaultSummary } from './vault.js';
export { VaultStore } from './vault-store.js';
export type { VaultState } from './vault-store.js';
