import { systemClock } from "@/lib/clock";
import { getEnv } from "@/lib/env";
import { AccessError } from "@/lib/errors";
import { ListingCache } from "@/lib/gallery/listing";
import { clampPage, paginate, totalPages } from "@/lib/gallery/pager";
import { breadcrumbs, parentPrefix } from "@/lib/gallery/paths";
import { ThumbnailCache } from "@/lib/gallery/thumbnails";
import { componentLogger } from "@/lib/logger";
import { getBlobServiceClient } from "@/lib/storage/azure";
import { BlobGateway } from "@/lib/storage/blob-gateway";
import type { ObjectStoreGateway } from "@/lib/storage/gateway";
import type { GalleryPage } from "@/lib/types";

export type Gallery = {
  bucket: string;
  gateway: ObjectStoreGateway;
  listing: ListingCache;
  thumbnails: ThumbnailCache;
  listingMaxKeys: number;
};

let cachedGallery: Gallery | null = null;

export const getGallery = (): Gallery => {
  if (cachedGallery) {
    return cachedGallery;
  }

  const env = getEnv();
  const gateway = new BlobGateway(getBlobServiceClient());

  cachedGallery = {
    bucket: env.galleryContainer,
    gateway,
    listingMaxKeys: env.listingMaxKeys,
    listing: new ListingCache({
      gateway,
      clock: systemClock,
      ttlMs: env.listingTtlSeconds * 1000,
      imageExtensions: env.imageExtensions,
      maxEntries: env.listingCacheMaxEntries,
      logger: componentLogger("listing"),
    }),
    thumbnails: new ThumbnailCache({
      gateway,
      clock: systemClock,
      ttlMs: env.thumbnailTtlSeconds * 1000,
      maxEntries: env.thumbnailCacheMaxEntries,
      variants: {
        preview: { maxPx: env.previewMaxPx, quality: env.previewQuality },
        fullscreen: { maxPx: env.fullscreenMaxPx, quality: env.fullscreenQuality },
      },
      logger: componentLogger("thumbnails"),
    }),
  };

  return cachedGallery;
};

export const assertBucketAccess = async (gateway: ObjectStoreGateway, bucket: string): Promise<void> => {
  const head = await gateway.head(bucket);

  if (head.status === "not-found") {
    throw new AccessError(bucket, "BUCKET_NOT_FOUND");
  }

  if (head.status === "forbidden") {
    throw new AccessError(bucket, "BUCKET_FORBIDDEN");
  }

  if (head.status === "error") {
    throw new AccessError(bucket, "BUCKET_UNAVAILABLE", head.message);
  }
};

/**
 * Assemble one view of the gallery: folders and the requested page of images
 * under `prefix`. The page index is clamped to the available range.
 */
export const loadGalleryPage = async (
  gallery: Gallery,
  prefix: string,
  requestedPage: number,
  pageSize: number,
): Promise<GalleryPage> => {
  await assertBucketAccess(gallery.gateway, gallery.bucket);

  const [folders, images] = await Promise.all([
    gallery.listing.listFolders(gallery.bucket, prefix),
    gallery.listing.listImages(gallery.bucket, prefix, gallery.listingMaxKeys),
  ]);

  const pageCount = totalPages(images.items.length, pageSize);
  const page = clampPage(requestedPage, pageCount);
  const slice = paginate(images.items, page, pageSize);

  return {
    prefix,
    parentPrefix: parentPrefix(prefix),
    breadcrumbs: breadcrumbs(prefix),
    folders: folders.items,
    images: slice.items,
    page,
    pageSize,
    totalCount: slice.totalCount,
    totalPages: pageCount,
    warnings: [folders.warning, images.warning].filter((warning): warning is string => warning !== null),
  };
};
