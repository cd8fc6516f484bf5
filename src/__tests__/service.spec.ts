import { AccessError } from "../lib/errors";
import { loadGalleryPage } from "../lib/gallery/service";
import type { BucketStatus } from "../lib/storage/gateway";
import type { FakeObject } from "./fakes";
import { FakeGateway, makeGallery } from "./fakes";

// Ten photos in trips/ and a newer one in the trips/alps/ sub-folder.
const tripObjects = (): FakeObject[] => [
  ...Array.from({ length: 10 }, (_, index) => ({
    key: `trips/photo-${String(index + 1).padStart(2, "0")}.jpg`,
    size: 1000,
    lastModified: new Date(Date.UTC(2024, 0, index + 1)),
  })),
  { key: "trips/alps/peak.jpg", size: 2000, lastModified: new Date(Date.UTC(2024, 1, 1)) },
];

describe("loadGalleryPage", () => {
  it("assembles folders, navigation and the requested page", async () => {
    const page = await loadGalleryPage(makeGallery(new FakeGateway(tripObjects())), "trips/", 1, 4);

    expect(page).toMatchObject({
      prefix: "trips/",
      parentPrefix: "",
      breadcrumbs: [
        { name: "Home", prefix: "" },
        { name: "trips", prefix: "trips/" },
      ],
      folders: [{ name: "alps", path: "trips/alps/" }],
      page: 1,
      pageSize: 4,
      totalCount: 11,
      totalPages: 3,
      warnings: [],
    });
    expect(page.images.map((image) => image.filename)).toEqual([
      "photo-07.jpg",
      "photo-06.jpg",
      "photo-05.jpg",
      "photo-04.jpg",
    ]);
  });

  it("clamps a page past the end to the last page", async () => {
    const page = await loadGalleryPage(makeGallery(new FakeGateway(tripObjects())), "trips/", 9, 4);

    expect(page.page).toBe(2);
    expect(page.images.map((image) => image.filename)).toEqual(["photo-03.jpg", "photo-02.jpg", "photo-01.jpg"]);
  });

  it("shows a single empty page for an empty folder", async () => {
    const page = await loadGalleryPage(makeGallery(new FakeGateway()), "", 0, 8);

    expect(page).toMatchObject({ parentPrefix: null, images: [], totalCount: 0, totalPages: 1, page: 0 });
  });

  it("surfaces listing failures as warnings", async () => {
    const gateway = new FakeGateway(tripObjects());
    gateway.failLists = true;

    const page = await loadGalleryPage(makeGallery(gateway), "trips/", 0, 4);

    expect(page.folders).toEqual([]);
    expect(page.images).toEqual([]);
    expect(page.warnings).toEqual([
      "Error listing folders: list test-bucket/trips/ failed: connection reset",
      "Error listing images: list test-bucket/trips/ failed: connection reset",
    ]);
  });

  const refusals: Array<[BucketStatus, string, number]> = [
    [{ status: "not-found" }, "Bucket 'test-bucket' not found.", 404],
    [{ status: "forbidden" }, "Access denied to bucket 'test-bucket'. Check your permissions.", 403],
    [{ status: "error", message: "timed out" }, "Error accessing bucket 'test-bucket': timed out", 502],
  ];

  it.each(refusals)("refuses the view when the bucket check reports %p", async (status, message, httpStatus) => {
    const gateway = new FakeGateway(tripObjects());
    gateway.headStatus = status;

    const error = await loadGalleryPage(makeGallery(gateway), "trips/", 0, 4).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AccessError);
    expect(error instanceof AccessError && error.message).toBe(message);
    expect(error instanceof AccessError && error.httpStatus).toBe(httpStatus);
    expect(gateway.calls.list).toBe(0);
  });
});
