import pino from "pino";
import type { Clock } from "../lib/clock";
import { DEFAULT_IMAGE_EXTENSIONS } from "../lib/env";
import { TransportError } from "../lib/errors";
import { ListingCache } from "../lib/gallery/listing";
import type { Gallery } from "../lib/gallery/service";
import { ThumbnailCache } from "../lib/gallery/thumbnails";
import { fail, ok } from "../lib/storage/gateway";
import type {
  BucketStatus,
  GatewayResult,
  ListOptions,
  ObjectListing,
  ObjectStoreGateway,
  StoredObject,
} from "../lib/storage/gateway";

export const silentLogger = pino({ enabled: false });

export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export type FakeObject = {
  key: string;
  size?: number;
  lastModified?: Date;
  data?: Buffer;
  contentType?: string;
};

/** In-memory bucket with S3-style delimiter semantics. */
export class FakeGateway implements ObjectStoreGateway {
  readonly calls = { head: 0, list: 0, get: 0 };
  headStatus: BucketStatus = { status: "ok" };
  failLists = false;
  failGets = false;
  private readonly objects = new Map<string, FakeObject>();

  constructor(objects: FakeObject[] = []) {
    for (const object of objects) {
      this.put(object);
    }
  }

  put(object: FakeObject): void {
    this.objects.set(object.key, object);
  }

  async head(): Promise<BucketStatus> {
    this.calls.head += 1;
    return this.headStatus;
  }

  async list(bucket: string, prefix: string, options: ListOptions = {}): Promise<GatewayResult<ObjectListing>> {
    this.calls.list += 1;
    if (this.failLists) {
      return fail(new TransportError(`list ${bucket}/${prefix}`, "connection reset"));
    }

    const maxKeys = options.maxKeys ?? 1000;
    const listing: ObjectListing = { commonPrefixes: [], contents: [] };
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();

    for (const key of keys) {
      if (listing.commonPrefixes.length + listing.contents.length >= maxKeys) {
        break;
      }

      const rest = key.slice(prefix.length);
      const cut = options.delimiter ? rest.indexOf(options.delimiter) : -1;
      if (options.delimiter && cut >= 0) {
        const common = `${prefix}${rest.slice(0, cut + options.delimiter.length)}`;
        if (!listing.commonPrefixes.includes(common)) {
          listing.commonPrefixes.push(common);
        }
        continue;
      }

      const object = this.objects.get(key);
      if (object) {
        listing.contents.push({
          key,
          size: object.size ?? object.data?.length ?? 0,
          lastModified: object.lastModified ?? new Date(0),
        });
      }
    }

    return ok(listing);
  }

  async get(bucket: string, key: string): Promise<GatewayResult<StoredObject>> {
    this.calls.get += 1;
    const object = this.objects.get(key);
    if (this.failGets || !object) {
      return fail(new TransportError(`get ${bucket}/${key}`, "not available", { statusCode: 404 }));
    }

    return ok({ data: object.data ?? Buffer.alloc(0), contentType: object.contentType ?? null });
  }
}

/** Gallery over a fake bucket named `test-bucket`, wired with the default settings. */
export const makeGallery = (gateway: FakeGateway): Gallery => {
  const clock = new ManualClock(0);
  return {
    bucket: "test-bucket",
    gateway,
    listingMaxKeys: 1000,
    listing: new ListingCache({
      gateway,
      clock,
      ttlMs: 300 * 1000,
      imageExtensions: DEFAULT_IMAGE_EXTENSIONS,
      maxEntries: 100,
      logger: silentLogger,
    }),
    thumbnails: new ThumbnailCache({
      gateway,
      clock,
      ttlMs: 3600 * 1000,
      maxEntries: 10,
      variants: {
        preview: { maxPx: 300, quality: 85 },
        fullscreen: { maxPx: 1440, quality: 95 },
      },
      logger: silentLogger,
    }),
  };
};
