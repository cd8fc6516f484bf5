import sharp from "sharp";
import type { Clock } from "@/lib/clock";
import { TtlCache, cacheKey } from "@/lib/cache/ttl-cache";
import { DecodeError, errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { ObjectStoreGateway } from "@/lib/storage/gateway";
import type { Thumbnail, ThumbnailVariant } from "@/lib/types";

export type VariantSettings = {
  maxPx: number;
  quality: number;
};

export type ThumbnailCacheOptions = {
  gateway: ObjectStoreGateway;
  clock: Clock;
  ttlMs: number;
  maxEntries: number;
  variants: Record<ThumbnailVariant, VariantSettings>;
  logger: Logger;
};

/**
 * Decode, normalise and shrink an image into a JPEG that fits inside a
 * `maxPx` square. Images already inside the bound keep their size.
 */
export async function renderThumbnail(key: string, bytes: Buffer, settings: VariantSettings): Promise<Thumbnail> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (error) {
    throw new DecodeError(key, errorMessage(error, "unreadable image"), error);
  }

  let pipeline = sharp(bytes).resize(settings.maxPx, settings.maxPx, {
    fit: "inside",
    withoutEnlargement: true,
    kernel: sharp.kernel.lanczos3,
  });

  const plainGrey = metadata.space === "b-w" && !metadata.hasAlpha;
  const plainRgb = metadata.space === "srgb" && !metadata.hasAlpha;
  if (plainGrey) {
    pipeline = pipeline.toColourspace("b-w");
  } else if (!plainRgb) {
    // Palette, alpha, CMYK and the rest all end up as three-channel sRGB.
    pipeline = pipeline.removeAlpha().toColourspace("srgb");
  }

  try {
    const { data, info } = await pipeline
      .jpeg({ quality: settings.quality, optimiseCoding: true })
      .toBuffer({ resolveWithObject: true });

    return { data, contentType: "image/jpeg", width: info.width, height: info.height };
  } catch (error) {
    throw new DecodeError(key, errorMessage(error, "encoding failed"), error);
  }
}

export class ThumbnailCache {
  private readonly cache: TtlCache<Thumbnail>;
  private readonly gateway: ObjectStoreGateway;
  private readonly variants: Record<ThumbnailVariant, VariantSettings>;
  private readonly logger: Logger;

  constructor(options: ThumbnailCacheOptions) {
    this.gateway = options.gateway;
    this.variants = options.variants;
    this.logger = options.logger;
    this.cache = new TtlCache({ ttlMs: options.ttlMs, clock: options.clock, maxEntries: options.maxEntries });
  }

  /** Returns null for anything that cannot be rendered; the caller shows a placeholder. */
  async getThumbnail(bucket: string, key: string, variant: ThumbnailVariant): Promise<Thumbnail | null> {
    const thumbnail = await this.cache.getOrLoad(cacheKey(bucket, key, variant), () =>
      this.generate(bucket, key, variant),
    );

    return thumbnail ?? null;
  }

  private async generate(bucket: string, key: string, variant: ThumbnailVariant): Promise<Thumbnail | undefined> {
    try {
      const result = await this.gateway.get(bucket, key);
      if (!result.ok) {
        this.logger.warn({ bucket, key, err: result.error }, `Storage error loading ${key}`);
        return undefined;
      }

      if (result.value.data.length === 0) {
        this.logger.warn({ bucket, key }, `Empty image file: ${key}`);
        return undefined;
      }

      return await renderThumbnail(key, result.value.data, this.variants[variant]);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.logger.warn({ bucket, key, variant, err: error }, error.message);
      } else {
        this.logger.error({ bucket, key, variant, err: error }, `Unexpected error loading ${key}`);
      }

      return undefined;
    }
  }
}
