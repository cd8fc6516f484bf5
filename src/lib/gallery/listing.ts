import type { Clock } from "@/lib/clock";
import { TtlCache, cacheKey } from "@/lib/cache/ttl-cache";
import { errorMessage } from "@/lib/errors";
import { fileNameOf, folderNameOf, isImageKey } from "@/lib/gallery/paths";
import type { Logger } from "@/lib/logger";
import type { ObjectStoreGateway, StoredObjectSummary } from "@/lib/storage/gateway";
import type { FolderEntry, ImageEntry } from "@/lib/types";

export type Listing<T> = {
  items: T[];
  warning: string | null;
};

export type ListingCacheOptions = {
  gateway: ObjectStoreGateway;
  clock: Clock;
  ttlMs: number;
  imageExtensions: readonly string[];
  /** Bound on cached prefixes, applied to folders and images separately. */
  maxEntries: number;
  logger: Logger;
};

const DELIMITER = "/";
const DEFAULT_MAX_KEYS = 1000;

export const toFolderEntries = (commonPrefixes: readonly string[]): FolderEntry[] => {
  return commonPrefixes.map((path) => ({ name: folderNameOf(path), path }));
};

/** Keep non-empty objects with an image extension, newest first. */
export const toImageEntries = (
  contents: readonly StoredObjectSummary[],
  imageExtensions: readonly string[],
): ImageEntry[] => {
  return contents
    .filter((object) => object.size > 0 && isImageKey(object.key, imageExtensions))
    .map((object) => ({
      key: object.key,
      size: object.size,
      lastModified: object.lastModified.toISOString(),
      filename: fileNameOf(object.key),
    }))
    .sort((a, b) => b.lastModified.localeCompare(a.lastModified));
};

export class ListingCache {
  private readonly folders: TtlCache<FolderEntry[]>;
  private readonly images: TtlCache<ImageEntry[]>;
  private readonly gateway: ObjectStoreGateway;
  private readonly imageExtensions: readonly string[];
  private readonly logger: Logger;

  constructor(options: ListingCacheOptions) {
    this.gateway = options.gateway;
    this.imageExtensions = options.imageExtensions;
    this.logger = options.logger;
    const cacheOptions = { ttlMs: options.ttlMs, clock: options.clock, maxEntries: options.maxEntries };
    this.folders = new TtlCache<FolderEntry[]>(cacheOptions);
    this.images = new TtlCache<ImageEntry[]>(cacheOptions);
  }

  async listFolders(bucket: string, prefix: string): Promise<Listing<FolderEntry>> {
    return this.load("folders", bucket, prefix, () =>
      this.folders.getOrLoad(cacheKey(bucket, prefix), async () => {
        const result = await this.gateway.list(bucket, prefix, { delimiter: DELIMITER });
        if (!result.ok) {
          throw result.error;
        }

        return toFolderEntries(result.value.commonPrefixes);
      }),
    );
  }

  /** Every image under `prefix`, sub-folders included. */
  async listImages(bucket: string, prefix: string, maxKeys = DEFAULT_MAX_KEYS): Promise<Listing<ImageEntry>> {
    return this.load("images", bucket, prefix, () =>
      this.images.getOrLoad(cacheKey(bucket, prefix, String(maxKeys)), async () => {
        const result = await this.gateway.list(bucket, prefix, { maxKeys });
        if (!result.ok) {
          throw result.error;
        }

        return toImageEntries(result.value.contents, this.imageExtensions);
      }),
    );
  }

  private async load<T>(
    what: "folders" | "images",
    bucket: string,
    prefix: string,
    run: () => Promise<T[] | undefined>,
  ): Promise<Listing<T>> {
    try {
      const items = await run();
      return { items: items ?? [], warning: null };
    } catch (error) {
      const warning = `Error listing ${what}: ${errorMessage(error, "unknown error")}`;
      this.logger.warn({ bucket, prefix, err: error }, warning);
      return { items: [], warning };
    }
  }
}
