/**
 * Remote Store Module
 * Key-value backends the profile store persists into
 */

export { InMemoryRemoteStore, type FailureRule } from './InMemoryRemoteStore';
export { FileRemoteStore } from './FileRemoteStore';
export { compareKeys, sortKeys } from './keys';

export type { RemoteStore, RemoteStoreCall, RemoteStoreOperation } from './types';
