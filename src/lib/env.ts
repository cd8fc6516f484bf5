import { ConfigError } from "@/lib/errors";

export type AppEnv = {
  azureStorageConnectionString: string;
  galleryContainer: string;
  authTable: string;
  galleryPin: string;
  sessionSecret: string;
  sessionTimeoutSeconds: number;
  authMaxAttempts: number;
  authLockoutSeconds: number;
  imagesPerPage: number;
  previewMaxPx: number;
  previewQuality: number;
  fullscreenMaxPx: number;
  fullscreenQuality: number;
  listingTtlSeconds: number;
  listingCacheMaxEntries: number;
  thumbnailTtlSeconds: number;
  thumbnailCacheMaxEntries: number;
  listingMaxKeys: number;
  imageExtensions: string[];
};

type Source = Record<string, string | undefined>;

export const DEFAULT_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".bmp", ".webp"];

const required = (value: string | undefined, name: string): string => {
  if (!value || value.trim().length === 0) {
    throw new ConfigError(`Missing required environment variable: ${name}`, name);
  }

  return value;
};

const optionalNumber = (
  value: string | undefined,
  defaultValue: number,
  minimum: number,
  name: string,
  maximum = Number.MAX_SAFE_INTEGER,
): number => {
  if (!value || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minimum || parsed > maximum) {
    throw new ConfigError(`Invalid ${name}: expected integer between ${minimum} and ${maximum}`, name);
  }

  return parsed;
};

const optionalString = (value: string | undefined, defaultValue: string): string => {
  if (!value || value.trim().length === 0) {
    return defaultValue;
  }

  return value;
};

const extensionList = (value: string | undefined, name: string): string[] => {
  if (!value || value.trim().length === 0) {
    return DEFAULT_IMAGE_EXTENSIONS;
  }

  const extensions = value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.startsWith(".") ? entry : `.${entry}`));

  if (extensions.length === 0) {
    throw new ConfigError(`Invalid ${name}: expected a comma-separated list of extensions`, name);
  }

  return extensions;
};

export const loadEnv = (source: Source): AppEnv => {
  const nextEnv: AppEnv = {
    azureStorageConnectionString: required(
      source.AZURE_STORAGE_CONNECTION_STRING,
      "AZURE_STORAGE_CONNECTION_STRING",
    ),
    galleryContainer: required(source.GALLERY_CONTAINER, "GALLERY_CONTAINER"),
    authTable: optionalString(source.AUTH_TABLE, "GalleryAuth"),
    galleryPin: required(source.GALLERY_PIN, "GALLERY_PIN"),
    sessionSecret: required(source.SESSION_SECRET, "SESSION_SECRET"),
    sessionTimeoutSeconds: optionalNumber(source.SESSION_TIMEOUT_SECONDS, 43200, 60, "SESSION_TIMEOUT_SECONDS"),
    authMaxAttempts: optionalNumber(source.AUTH_MAX_ATTEMPTS, 5, 1, "AUTH_MAX_ATTEMPTS"),
    authLockoutSeconds: optionalNumber(source.AUTH_LOCKOUT_SECONDS, 3600, 1, "AUTH_LOCKOUT_SECONDS"),
    imagesPerPage: optionalNumber(source.IMAGES_PER_PAGE, 8, 1, "IMAGES_PER_PAGE", 100),
    previewMaxPx: optionalNumber(source.PREVIEW_MAX_PX, 300, 16, "PREVIEW_MAX_PX"),
    previewQuality: optionalNumber(source.PREVIEW_QUALITY, 85, 1, "PREVIEW_QUALITY", 100),
    fullscreenMaxPx: optionalNumber(source.FULLSCREEN_MAX_PX, 1440, 16, "FULLSCREEN_MAX_PX"),
    fullscreenQuality: optionalNumber(source.FULLSCREEN_QUALITY, 95, 1, "FULLSCREEN_QUALITY", 100),
    listingTtlSeconds: optionalNumber(source.LISTING_TTL_SECONDS, 300, 0, "LISTING_TTL_SECONDS"),
    listingCacheMaxEntries: optionalNumber(
      source.LISTING_CACHE_MAX_ENTRIES,
      200,
      1,
      "LISTING_CACHE_MAX_ENTRIES",
    ),
    thumbnailTtlSeconds: optionalNumber(source.THUMBNAIL_TTL_SECONDS, 3600, 0, "THUMBNAIL_TTL_SECONDS"),
    thumbnailCacheMaxEntries: optionalNumber(
      source.THUMBNAIL_CACHE_MAX_ENTRIES,
      500,
      1,
      "THUMBNAIL_CACHE_MAX_ENTRIES",
    ),
    listingMaxKeys: optionalNumber(source.LISTING_MAX_KEYS, 1000, 1, "LISTING_MAX_KEYS", 5000),
    imageExtensions: extensionList(source.IMAGE_EXTENSIONS, "IMAGE_EXTENSIONS"),
  };

  if (nextEnv.sessionSecret.length < 32) {
    throw new ConfigError("SESSION_SECRET must be at least 32 characters long", "SESSION_SECRET");
  }

  return nextEnv;
};

let cachedEnv: AppEnv | null = null;

export const getEnv = (): AppEnv => {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = loadEnv(process.env);
  return cachedEnv;
};
