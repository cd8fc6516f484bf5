export type AuthSession = {
  authenticated: boolean;
  authTimeMs: number | null;
  failedAttempts: number;
  lockoutUntilMs: number | null;
};

export type GateDecision =
  | { kind: "granted" }
  | { kind: "denied-locked-out"; secondsRemaining: number }
  | { kind: "denied-bad-pin"; attemptsRemaining: number }
  | { kind: "denied-no-pin" }
  | { kind: "requires-pin"; sessionExpired: boolean };

export type LockoutStatus = {
  isLocked: boolean;
  failedAttempts: number;
  maxAttempts: number;
  lockUntilEpochMs: number;
  retryAfterSeconds: number;
};

export type FolderEntry = {
  name: string;
  path: string;
};

export type ImageEntry = {
  key: string;
  size: number;
  lastModified: string;
  filename: string;
};

export type Breadcrumb = {
  name: string;
  prefix: string;
};

export type ThumbnailVariant = "preview" | "fullscreen";

export type Thumbnail = {
  data: Buffer;
  contentType: "image/jpeg";
  width: number;
  height: number;
};

export type GalleryPage = {
  prefix: string;
  parentPrefix: string | null;
  breadcrumbs: Breadcrumb[];
  folders: FolderEntry[];
  images: ImageEntry[];
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  warnings: string[];
};
