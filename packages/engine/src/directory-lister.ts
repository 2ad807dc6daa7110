import type { EntryMetadata } from "../../core/src/index";
import type { FilesystemProvider } from "./providers/provider";

export const DEFAULT_PAGE_SIZE = 256;

export type ProviderLookup = (handleId: string) => FilesystemProvider;

/**
 * Lazy, finite listing of one directory. Each iteration lists the directory
 * again, so a listing can be restarted to refresh a view.
 */
export interface DirectoryListing extends AsyncIterable<EntryMetadata> {
  readonly handleId: string;
  readonly path: string;
  pages(): AsyncIterable<EntryMetadata[]>;
  collect(): Promise<EntryMetadata[]>;
}

class ProviderDirectoryListing implements DirectoryListing {
  constructor(
    private readonly lookup: ProviderLookup,
    readonly handleId: string,
    readonly path: string,
    private readonly pageSize: number
  ) {}

  async *pages(): AsyncGenerator<EntryMetadata[]> {
    const provider = this.lookup(this.handleId);
    yield* provider.listPages(this.path, this.pageSize);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<EntryMetadata> {
    for await (const page of this.pages()) {
      yield* page;
    }
  }

  async collect(): Promise<EntryMetadata[]> {
    const entries: EntryMetadata[] = [];
    for await (const entry of this) {
      entries.push(entry);
    }
    return entries;
  }
}

export class DirectoryLister {
  constructor(
    private readonly lookup: ProviderLookup,
    private readonly defaultPageSize = DEFAULT_PAGE_SIZE
  ) {}

  list(handleId: string, path: string, options: { pageSize?: number } = {}): DirectoryListing {
    const pageSize = options.pageSize && options.pageSize > 0 ? Math.floor(options.pageSize) : this.defaultPageSize;
    return new ProviderDirectoryListing(this.lookup, handleId, path, pageSize);
  }
}
