import type { Breadcrumb } from "@/lib/types";

const SEPARATOR = "/";

const segmentsOf = (prefix: string): string[] => prefix.split(SEPARATOR).filter((part) => part.length > 0);

/**
 * Turn user input into a listing prefix: no leading separator, exactly one
 * trailing separator, or the empty string for the bucket root.
 */
export const normalizePrefix = (raw: string): string => {
  const segments = segmentsOf(raw.trim());

  if (segments.some((segment) => segment === "." || segment === "..")) {
    throw new RangeError(`Invalid path: ${raw}`);
  }

  return segments.length === 0 ? "" : `${segments.join(SEPARATOR)}${SEPARATOR}`;
};

export const parentPrefix = (prefix: string): string | null => {
  const segments = segmentsOf(prefix);
  if (segments.length === 0) {
    return null;
  }

  const parent = segments.slice(0, -1);
  return parent.length === 0 ? "" : `${parent.join(SEPARATOR)}${SEPARATOR}`;
};

export const breadcrumbs = (prefix: string): Breadcrumb[] => {
  const crumbs: Breadcrumb[] = [{ name: "Home", prefix: "" }];
  let path = "";

  for (const segment of segmentsOf(prefix)) {
    path = `${path}${segment}${SEPARATOR}`;
    crumbs.push({ name: segment, prefix: path });
  }

  return crumbs;
};

export const fileNameOf = (key: string): string => {
  const segments = key.split(SEPARATOR);
  return segments[segments.length - 1] ?? key;
};

/** Last non-empty segment of a folder prefix such as `wedding/ceremony/`. */
export const folderNameOf = (prefix: string): string => {
  const segments = segmentsOf(prefix);
  return segments[segments.length - 1] ?? "";
};

export const isImageKey = (key: string, extensions: readonly string[]): boolean => {
  const lower = key.toLowerCase();
  return extensions.some((extension) => lower.endsWith(extension.toLowerCase()));
};
