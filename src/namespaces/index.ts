export { NamespaceRegistry, isNamespaceHandler } from './registry.js';
export { getSharedNamespaces, setSharedNamespaces } from './shared.js';
export {
  namespaceMetadataSchema,
  actionMetadataSchema,
  normalizeMetadata,
  findActionMetadata,
  checkActionAllowed,
  suppressesResponse,
} from './metadata.js';

export type { NamespaceRegistryOptions } from './registry.js';
export type { NamespaceMetadataInput } from './metadata.js';
export type { NamespaceHandler, NamespaceMetadata, ActionMetadata, NamespaceInfo } from './types.js';
