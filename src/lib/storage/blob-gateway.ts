import { buffer } from "node:stream/consumers";
import type { BlobServiceClient, ContainerClient } from "@azure/storage-blob";
import { TransportError, errorMessage } from "@/lib/errors";
import { getStatusCode } from "@/lib/storage/azure";
import { fail, ok } from "@/lib/storage/gateway";
import type {
  BucketStatus,
  GatewayResult,
  ListOptions,
  ObjectListing,
  ObjectStoreGateway,
  StoredObject,
} from "@/lib/storage/gateway";

const DEFAULT_MAX_KEYS = 1000;

const toTransportError = (operation: string, error: unknown): TransportError => {
  return new TransportError(operation, errorMessage(error, "unknown storage error"), {
    statusCode: getStatusCode(error),
    cause: error,
  });
};

/** Azure Blob Storage gateway; a container plays the part of a bucket. */
export class BlobGateway implements ObjectStoreGateway {
  constructor(private readonly serviceClient: BlobServiceClient) {}

  private container(bucket: string): ContainerClient {
    return this.serviceClient.getContainerClient(bucket);
  }

  async head(bucket: string): Promise<BucketStatus> {
    try {
      await this.container(bucket).getProperties();
      return { status: "ok" };
    } catch (error) {
      const statusCode = getStatusCode(error);
      if (statusCode === 404) {
        return { status: "not-found" };
      }

      if (statusCode === 403) {
        return { status: "forbidden" };
      }

      return { status: "error", message: errorMessage(error, "unknown storage error") };
    }
  }

  async list(bucket: string, prefix: string, options: ListOptions = {}): Promise<GatewayResult<ObjectListing>> {
    const maxKeys = options.maxKeys ?? DEFAULT_MAX_KEYS;

    try {
      const listing = options.delimiter
        ? await this.listHierarchy(bucket, prefix, options.delimiter, maxKeys)
        : await this.listFlat(bucket, prefix, maxKeys);
      return ok(listing);
    } catch (error) {
      return fail(toTransportError(`list ${bucket}/${prefix}`, error));
    }
  }

  async get(bucket: string, key: string): Promise<GatewayResult<StoredObject>> {
    try {
      const response = await this.container(bucket).getBlobClient(key).download();
      const data = response.readableStreamBody ? await buffer(response.readableStreamBody) : Buffer.alloc(0);
      return ok({ data, contentType: response.contentType ?? null });
    } catch (error) {
      return fail(toTransportError(`get ${bucket}/${key}`, error));
    }
  }

  private async listHierarchy(
    bucket: string,
    prefix: string,
    delimiter: string,
    maxKeys: number,
  ): Promise<ObjectListing> {
    const listing: ObjectListing = { commonPrefixes: [], contents: [] };

    for await (const item of this.container(bucket).listBlobsByHierarchy(delimiter, { prefix })) {
      if (listing.commonPrefixes.length + listing.contents.length >= maxKeys) {
        break;
      }

      if (item.kind === "prefix") {
        listing.commonPrefixes.push(item.name);
      } else {
        listing.contents.push({
          key: item.name,
          size: item.properties.contentLength ?? 0,
          lastModified: item.properties.lastModified,
        });
      }
    }

    return listing;
  }

  private async listFlat(bucket: string, prefix: string, maxKeys: number): Promise<ObjectListing> {
    const listing: ObjectListing = { commonPrefixes: [], contents: [] };

    for await (const item of this.container(bucket).listBlobsFlat({ prefix })) {
      if (listing.contents.length >= maxKeys) {
        break;
      }

      listing.contents.push({
        key: item.name,
        size: item.properties.contentLength ?? 0,
        lastModified: item.properties.lastModified,
      });
    }

    return listing;
  }
}
