import { BlobServiceClient } from "@azure/storage-blob";
import { TableClient } from "@azure/data-tables";
import { getEnv } from "@/lib/env";

type AzureClients = {
  blobServiceClient: BlobServiceClient;
  authTableClient: TableClient;
};

let cachedClients: AzureClients | null = null;
let initializationPromise: Promise<void> | null = null;

const getClients = (): AzureClients => {
  if (cachedClients) {
    return cachedClients;
  }

  const env = getEnv();
  const connectionString = env.azureStorageConnectionString;

  cachedClients = {
    blobServiceClient: BlobServiceClient.fromConnectionString(connectionString),
    authTableClient: TableClient.fromConnectionString(connectionString, env.authTable),
  };

  return cachedClients;
};

/**
 * Creates the session table on first use. The gallery container is never
 * created here; a missing container is reported as an access error instead.
 */
export const initializeStorage = async (): Promise<void> => {
  if (!initializationPromise) {
    initializationPromise = getClients()
      .authTableClient.createTable()
      .catch((error: unknown) => {
        if (getStatusCode(error) !== 409) {
          initializationPromise = null;
          throw error;
        }
      });
  }

  await initializationPromise;
};

export const getBlobServiceClient = () => getClients().blobServiceClient;
export const getAuthTableClient = () => getClients().authTableClient;

export const getStatusCode = (error: unknown): number | undefined => {
  if (!error || typeof error !== "object" || !("statusCode" in error)) {
    return undefined;
  }

  return typeof error.statusCode === "number" ? error.statusCode : undefined;
};

export const isNotFoundError = (error: unknown): boolean => {
  if (getStatusCode(error) === 404) {
    return true;
  }

  return Boolean(error && typeof error === "object" && "code" in error && error.code === "ResourceNotFound");
};
