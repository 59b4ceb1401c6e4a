import { OktaProvider, type OktaProviderOptions } from '../okta/provider';
import type { DirectoryRow } from '../types';
import type { DirectoryProvider } from './types';

export type { DirectoryProvider, RemoteApp, RemoteGroup, RemoteMember, RemoteUser } from './types';

export type ProviderOptions = OktaProviderOptions;

export type ProviderFactory = (directory: DirectoryRow, options: ProviderOptions) => DirectoryProvider;

/** Pick the provider implementation for a directory row. */
export const createProvider: ProviderFactory = (directory, options) => {
  switch (directory.provider) {
    case 'okta':
      return OktaProvider.fromDirectory(directory, options);
    default:
      throw new Error(`Unsupported directory provider: ${String(directory.provider)}`);
  }
};
