import type { TransportError } from "@/lib/errors";

export type GatewayResult<T> = { ok: true; value: T } | { ok: false; error: TransportError };

export type BucketStatus =
  | { status: "ok" }
  | { status: "not-found" }
  | { status: "forbidden" }
  | { status: "error"; message: string };

export type StoredObjectSummary = {
  key: string;
  size: number;
  lastModified: Date;
};

export type ObjectListing = {
  commonPrefixes: string[];
  contents: StoredObjectSummary[];
};

export type StoredObject = {
  data: Buffer;
  contentType: string | null;
};

export type ListOptions = {
  /** Group keys at the next occurrence of this separator (single-level listing). */
  delimiter?: string;
  /** Upper bound on prefixes plus objects read; the rest are omitted. */
  maxKeys?: number;
};

/**
 * Narrow view of a remote object store. Implementations translate SDK
 * exceptions into result values; nothing here throws for transport failures.
 */
export interface ObjectStoreGateway {
  head(bucket: string): Promise<BucketStatus>;
  list(bucket: string, prefix: string, options?: ListOptions): Promise<GatewayResult<ObjectListing>>;
  get(bucket: string, key: string): Promise<GatewayResult<StoredObject>>;
}

export const ok = <T>(value: T): GatewayResult<T> => ({ ok: true, value });

export const fail = <T>(error: TransportError): GatewayResult<T> => ({ ok: false, error });
