import { FsError, LOCAL_HANDLE_ID } from "../../core/src/index";
import type { ConnectionManager } from "./connection-manager";
import type { FilesystemProvider } from "./providers/provider";

/**
 * Maps handle ids to providers. The local provider lives for the whole
 * process; remote providers exist while their handle is connected.
 */
export class ProviderRegistry {
  constructor(
    private readonly local: FilesystemProvider,
    private readonly connections: ConnectionManager
  ) {}

  resolve(handleId: string): FilesystemProvider {
    if (handleId === LOCAL_HANDLE_ID) {
      return this.local;
    }

    const provider = this.connections.getProvider(handleId);
    if (!provider) {
      throw FsError.connectivity(`Not connected: ${handleId}`);
    }
    return provider;
  }

  concurrencyOf(handleId: string): number {
    return this.resolve(handleId).capabilities.maxConcurrency;
  }
}
