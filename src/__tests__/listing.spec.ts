import { DEFAULT_IMAGE_EXTENSIONS } from "../lib/env";
import { ListingCache, toFolderEntries, toImageEntries } from "../lib/gallery/listing";
import { FakeGateway, ManualClock, silentLogger } from "./fakes";

const BUCKET = "test-bucket";

const makeListing = (gateway: FakeGateway, clock = new ManualClock(0), maxEntries = 100) =>
  new ListingCache({
    gateway,
    clock,
    ttlMs: 300 * 1000,
    imageExtensions: DEFAULT_IMAGE_EXTENSIONS,
    maxEntries,
    logger: silentLogger,
  });

// Two empty folder markers and one photo directly under wedding/.
const weddingBucket = () =>
  new FakeGateway([
    { key: "wedding/ceremony/", size: 0, lastModified: new Date("2024-05-01T10:00:00Z") },
    { key: "wedding/reception/", size: 0, lastModified: new Date("2024-05-01T18:00:00Z") },
    { key: "wedding/cover.jpg", size: 5000, lastModified: new Date("2024-04-30T09:00:00Z") },
  ]);

describe("ListingCache", () => {
  it("lists the immediate sub-folders and images of a prefix", async () => {
    const listing = makeListing(weddingBucket());

    const folders = await listing.listFolders(BUCKET, "wedding/");
    const images = await listing.listImages(BUCKET, "wedding/");

    expect(folders).toEqual({
      items: [
        { name: "ceremony", path: "wedding/ceremony/" },
        { name: "reception", path: "wedding/reception/" },
      ],
      warning: null,
    });
    expect(images.items).toEqual([
      { key: "wedding/cover.jpg", size: 5000, lastModified: "2024-04-30T09:00:00.000Z", filename: "cover.jpg" },
    ]);
  });

  it("includes images stored in sub-folders", async () => {
    const gateway = weddingBucket();
    gateway.put({ key: "wedding/ceremony/vows.jpg", size: 7000, lastModified: new Date("2024-05-01T10:00:00Z") });

    const images = await makeListing(gateway).listImages(BUCKET, "wedding/");

    expect(images.items.map((image) => image.key)).toEqual(["wedding/ceremony/vows.jpg", "wedding/cover.jpg"]);
    expect(images.items[0]?.filename).toBe("vows.jpg");
  });

  it("serves repeated calls from cache within the freshness window", async () => {
    const gateway = weddingBucket();
    const clock = new ManualClock(0);
    const listing = makeListing(gateway, clock);

    await listing.listImages(BUCKET, "wedding/");
    gateway.put({ key: "wedding/late.jpg", size: 10, lastModified: new Date("2024-06-01T00:00:00Z") });
    const stale = await listing.listImages(BUCKET, "wedding/");
    expect(stale.items.map((image) => image.filename)).toEqual(["cover.jpg"]);
    expect(gateway.calls.list).toBe(1);

    clock.advance(300 * 1000);
    const fresh = await listing.listImages(BUCKET, "wedding/");
    expect(fresh.items.map((image) => image.filename)).toEqual(["late.jpg", "cover.jpg"]);
    expect(gateway.calls.list).toBe(2);
  });

  it("caps the number of entries read", async () => {
    const gateway = new FakeGateway(
      ["a.jpg", "b.jpg", "c.jpg"].map((key) => ({ key, size: 1, lastModified: new Date("2024-01-01T00:00:00Z") })),
    );

    const images = await makeListing(gateway).listImages(BUCKET, "", 2);
    expect(images.items.map((image) => image.key)).toEqual(["a.jpg", "b.jpg"]);
  });

  it("evicts the oldest prefix once the bound is reached", async () => {
    const gateway = weddingBucket();
    const listing = makeListing(gateway, new ManualClock(0), 1);

    await listing.listFolders(BUCKET, "wedding/");
    await listing.listFolders(BUCKET, "");
    await listing.listFolders(BUCKET, "wedding/");

    expect(gateway.calls.list).toBe(3);
  });

  it("degrades a transport failure to an empty listing with a warning", async () => {
    const gateway = weddingBucket();
    gateway.failLists = true;
    const listing = makeListing(gateway);

    await expect(listing.listFolders(BUCKET, "wedding/")).resolves.toEqual({
      items: [],
      warning: "Error listing folders: list test-bucket/wedding/ failed: connection reset",
    });
    await expect(listing.listImages(BUCKET, "wedding/")).resolves.toEqual({
      items: [],
      warning: "Error listing images: list test-bucket/wedding/ failed: connection reset",
    });
  });

  it("does not cache a failed listing", async () => {
    const gateway = weddingBucket();
    gateway.failLists = true;
    const listing = makeListing(gateway);

    await listing.listFolders(BUCKET, "wedding/");
    gateway.failLists = false;

    const folders = await listing.listFolders(BUCKET, "wedding/");
    expect(folders.items).toHaveLength(2);
    expect(folders.warning).toBeNull();
  });
});

describe("toImageEntries", () => {
  const at = (iso: string) => new Date(iso);

  it("drops empty objects and non-image keys", () => {
    const entries = toImageEntries(
      [
        { key: "a/photo.JPG", size: 10, lastModified: at("2024-01-01T00:00:00Z") },
        { key: "a/empty.jpg", size: 0, lastModified: at("2024-01-02T00:00:00Z") },
        { key: "a/notes.txt", size: 10, lastModified: at("2024-01-03T00:00:00Z") },
        { key: "a/scan.tiff", size: 10, lastModified: at("2024-01-04T00:00:00Z") },
      ],
      DEFAULT_IMAGE_EXTENSIONS,
    );

    expect(entries.map((entry) => entry.key)).toEqual(["a/photo.JPG"]);
  });

  it("accepts a configured extension set", () => {
    const entries = toImageEntries([{ key: "scan.tiff", size: 10, lastModified: at("2024-01-04T00:00:00Z") }], [
      ".tiff",
    ]);

    expect(entries).toHaveLength(1);
  });

  it("sorts newest first and keeps store order for ties", () => {
    const entries = toImageEntries(
      [
        { key: "old.jpg", size: 1, lastModified: at("2023-01-01T00:00:00Z") },
        { key: "tie-1.jpg", size: 1, lastModified: at("2024-01-01T00:00:00Z") },
        { key: "tie-2.jpg", size: 1, lastModified: at("2024-01-01T00:00:00Z") },
        { key: "new.jpg", size: 1, lastModified: at("2025-01-01T00:00:00Z") },
      ],
      DEFAULT_IMAGE_EXTENSIONS,
    );

    expect(entries.map((entry) => entry.filename)).toEqual(["new.jpg", "tie-1.jpg", "tie-2.jpg", "old.jpg"]);
  });
});

describe("toFolderEntries", () => {
  it("names each folder after its last segment", () => {
    expect(toFolderEntries(["trips/2024 summer/"])).toEqual([{ name: "2024 summer", path: "trips/2024 summer/" }]);
  });
});
