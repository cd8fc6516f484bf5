"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import type { FormEvent } from "react";
import type { GalleryPage, ImageEntry, LockoutStatus, ThumbnailVariant } from "@/lib/types";

type AuthStateResponse = {
  authenticated: boolean;
  sessionExpired: boolean;
  lockout: LockoutStatus;
};

type ApiError = {
  error: string;
  lockout?: LockoutStatus;
  sessionExpired?: boolean;
};

const PAGE_SIZE_OPTIONS = [6, 8, 12, 16, 20, 24];

const formatDate = (value: string): string => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return value;
  }

  return new Intl.DateTimeFormat(undefined, { dateStyle: "medium" }).format(date);
};

const formatKilobytes = (value: number): string => `${(value / 1024).toFixed(1)} KB`;

const parseError = async (response: Response): Promise<ApiError> => {
  try {
    return (await response.json()) as ApiError;
  } catch {
    return { error: "Request failed" };
  }
};

const thumbnailUrl = (key: string, variant: ThumbnailVariant): string =>
  `/api/gallery/thumbnail?${new URLSearchParams({ key, variant }).toString()}`;

const downloadUrl = (key: string): string => `/api/gallery/download?${new URLSearchParams({ key }).toString()}`;

function ImageCard({ image, onOpen }: { image: ImageEntry; onOpen: (image: ImageEntry) => void }) {
  const [status, setStatus] = useState<"loading" | "ready" | "failed">("loading");

  if (status === "failed") {
    return (
      <li className="rounded-2xl border border-rose-200 bg-rose-50 p-3 text-xs text-rose-800">
        <p className="font-semibold">Cannot load: {image.filename}</p>
        <p className="mt-1">File may be corrupted or in unsupported format</p>
        <p className="mt-1 text-rose-700">Size: {formatKilobytes(image.size)}</p>
      </li>
    );
  }

  return (
    <li className="rounded-2xl border border-slate-200 bg-white p-3 shadow-sm">
      <button type="button" onClick={() => onOpen(image)} className="block w-full">
        {status === "loading" ? (
          <div className="flex aspect-square w-full items-center justify-center rounded-lg bg-slate-100 text-xs text-slate-500">
            Loading {image.filename}...
          </div>
        ) : null}
        {/* eslint-disable-next-line @next/next/no-img-element */}
        <img
          alt={image.filename}
          src={thumbnailUrl(image.key, "preview")}
          loading="lazy"
          onLoad={() => setStatus("ready")}
          onError={() => setStatus("failed")}
          className={status === "ready" ? "aspect-square w-full rounded-lg object-cover" : "hidden"}
        />
      </button>
      <p className="mt-2 truncate text-sm font-semibold text-slate-900">{image.filename}</p>
      <p className="text-xs text-slate-600">
        {formatKilobytes(image.size)} · {formatDate(image.lastModified)}
      </p>
      <a
        className="mt-2 inline-flex rounded-lg bg-sky-700 px-3 py-1.5 text-xs font-semibold text-white transition hover:bg-sky-800"
        href={downloadUrl(image.key)}
      >
        Download
      </a>
    </li>
  );
}

export function GalleryApp() {
  const [loading, setLoading] = useState(true);
  const [authenticated, setAuthenticated] = useState(false);
  const [sessionExpired, setSessionExpired] = useState(false);
  const [lockout, setLockout] = useState<LockoutStatus | null>(null);
  const [gallery, setGallery] = useState<GalleryPage | null>(null);
  const [prefix, setPrefix] = useState("");
  const [page, setPage] = useState(0);
  const [pageSize, setPageSize] = useState<number | null>(null);
  const [fullscreen, setFullscreen] = useState<ImageEntry | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [busyAction, setBusyAction] = useState<string | null>(null);
  const [pin, setPin] = useState("");
  const [timeNow, setTimeNow] = useState(() => Date.now());

  useEffect(() => {
    if (!lockout?.isLocked) {
      return;
    }

    const interval = window.setInterval(() => {
      setTimeNow(Date.now());
    }, 1000);

    return () => window.clearInterval(interval);
  }, [lockout?.isLocked]);

  const refreshGallery = useCallback(async () => {
    const params = new URLSearchParams({ prefix, page: String(page) });
    if (pageSize !== null) {
      params.set("pageSize", String(pageSize));
    }

    const response = await fetch(`/api/gallery?${params.toString()}`, {
      method: "GET",
      cache: "no-store",
    });

    if (response.status === 401) {
      const parsed = await parseError(response);
      if (parsed.sessionExpired) {
        setSessionExpired(true);
      }
      setAuthenticated(false);
      setGallery(null);
      return;
    }

    if (!response.ok) {
      const parsed = await parseError(response);
      setGallery(null);
      throw new Error(parsed.error || "Failed to load gallery");
    }

    const data = (await response.json()) as GalleryPage;
    setGallery(data);
    setPageSize(data.pageSize);
    if (data.page !== page) {
      setPage(data.page);
    }
  }, [prefix, page, pageSize]);

  const refreshState = useCallback(async () => {
    setError(null);

    try {
      const response = await fetch("/api/auth/state", {
        method: "GET",
        cache: "no-store",
      });

      if (!response.ok) {
        const parsed = await parseError(response);
        throw new Error(parsed.error || "Failed to fetch state");
      }

      const data = (await response.json()) as AuthStateResponse;
      setAuthenticated(data.authenticated);
      setLockout(data.lockout);
      if (data.sessionExpired) {
        setSessionExpired(true);
      }
    } catch (caughtError) {
      const message = caughtError instanceof Error ? caughtError.message : "Unable to load app state";
      setError(message);
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void refreshState();
  }, [refreshState]);

  useEffect(() => {
    if (!authenticated) {
      return;
    }

    refreshGallery().catch((caughtError: unknown) => {
      setError(caughtError instanceof Error ? caughtError.message : "Failed to load gallery");
    });
  }, [authenticated, refreshGallery]);

  const lockedSeconds = useMemo(() => {
    if (!lockout?.isLocked) {
      return 0;
    }

    return Math.max(0, Math.ceil((lockout.lockUntilEpochMs - timeNow) / 1000));
  }, [lockout, timeNow]);

  // The lockout window is checked server-side; poll once the countdown runs out.
  useEffect(() => {
    if (lockout?.isLocked && lockedSeconds === 0) {
      void refreshState();
    }
  }, [lockout?.isLocked, lockedSeconds, refreshState]);

  const handleLogin = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (busyAction) {
      return;
    }

    setBusyAction("login");
    setError(null);

    try {
      const response = await fetch("/api/auth/login", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ pin }),
      });

      if (!response.ok) {
        const parsed = await parseError(response);
        if (parsed.lockout) {
          setLockout(parsed.lockout);
        }
        throw new Error(parsed.error || "Login failed");
      }

      setPin("");
      setSessionExpired(false);
      await refreshState();
    } catch (caughtError) {
      const message = caughtError instanceof Error ? caughtError.message : "Login failed";
      setError(message);
    } finally {
      setBusyAction(null);
    }
  };

  const handleLogout = async () => {
    if (busyAction) {
      return;
    }

    setBusyAction("logout");
    setError(null);

    try {
      await fetch("/api/auth/logout", {
        method: "POST",
      });

      setAuthenticated(false);
      setGallery(null);
      setPrefix("");
      setPage(0);
      await refreshState();
    } catch (caughtError) {
      const message = caughtError instanceof Error ? caughtError.message : "Logout failed";
      setError(message);
    } finally {
      setBusyAction(null);
    }
  };

  const navigateTo = (nextPrefix: string) => {
    setFullscreen(null);
    setPrefix(nextPrefix);
    setPage(0);
  };

  if (loading) {
    return (
      <div className="mx-auto flex min-h-screen w-full max-w-6xl items-center justify-center px-4 py-8">
        <div className="rounded-2xl border border-white/20 bg-white/70 px-6 py-5 text-sm text-slate-700 shadow-[0_16px_60px_rgba(7,27,44,0.15)] backdrop-blur">
          Loading gallery...
        </div>
      </div>
    );
  }

  return (
    <div className="mx-auto min-h-screen w-full max-w-6xl px-4 py-8 sm:px-6 lg:px-8">
      <header className="mb-7 rounded-3xl border border-white/20 bg-white/70 p-5 shadow-[0_24px_80px_rgba(7,27,44,0.15)] backdrop-blur sm:p-7">
        <div className="flex flex-wrap items-center justify-between gap-4">
          <div>
            <p className="mb-1 text-xs font-semibold uppercase tracking-[0.22em] text-sky-700">Private Album</p>
            <h1 className="text-3xl font-semibold tracking-tight text-slate-900 sm:text-4xl">Photo Gallery</h1>
          </div>
          {authenticated ? (
            <button
              type="button"
              onClick={() => void handleLogout()}
              disabled={Boolean(busyAction)}
              className="rounded-lg bg-rose-700 px-3 py-1.5 text-xs font-semibold text-white transition hover:bg-rose-800 disabled:opacity-50"
            >
              {busyAction === "logout" ? "Signing out..." : "Lock"}
            </button>
          ) : null}
        </div>
      </header>

      {error ? (
        <div className="mb-5 rounded-2xl border border-rose-200 bg-rose-50 px-4 py-3 text-sm text-rose-800">{error}</div>
      ) : null}

      {!authenticated ? (
        <section className="mx-auto w-full max-w-lg rounded-3xl border border-white/20 bg-white/75 p-6 shadow-[0_24px_80px_rgba(7,27,44,0.15)] backdrop-blur sm:p-7">
          <h2 className="text-xl font-semibold text-slate-900">Enter PIN</h2>

          {sessionExpired ? (
            <div className="mt-4 rounded-xl border border-sky-200 bg-sky-50 px-4 py-3 text-sm text-sky-900">
              Session expired. Please enter the PIN again.
            </div>
          ) : null}

          {lockout?.isLocked ? (
            <div className="mt-4 rounded-xl border border-amber-200 bg-amber-50 px-4 py-3 text-sm text-amber-900">
              Locked due to repeated failures. Try again in {lockedSeconds}s.
            </div>
          ) : (
            <p className="mt-4 text-sm text-slate-600">
              Failed attempts: {lockout?.failedAttempts ?? 0}/{lockout?.maxAttempts ?? 5}
            </p>
          )}

          <form className="mt-5 space-y-4" onSubmit={handleLogin}>
            <label className="block">
              <span className="mb-1 block text-sm font-medium text-slate-800">PIN</span>
              <input
                value={pin}
                onChange={(event) => setPin(event.target.value)}
                type="password"
                inputMode="numeric"
                autoComplete="current-password"
                maxLength={64}
                className="w-full rounded-xl border border-slate-300 bg-white px-4 py-3 text-lg tracking-[0.2em] text-slate-900 outline-none transition focus:border-sky-500 focus:ring-4 focus:ring-sky-100"
                disabled={Boolean(busyAction) || Boolean(lockout?.isLocked)}
              />
            </label>

            <button
              type="submit"
              disabled={Boolean(busyAction) || Boolean(lockout?.isLocked)}
              className="w-full rounded-xl bg-sky-700 px-4 py-3 text-sm font-semibold tracking-wide text-white transition hover:bg-sky-800 disabled:cursor-not-allowed disabled:opacity-60"
            >
              {busyAction === "login" ? "Verifying..." : "Unlock gallery"}
            </button>
          </form>
        </section>
      ) : (
        <section className="space-y-6">
          <nav className="flex flex-wrap items-center gap-2 rounded-3xl border border-white/20 bg-white/75 p-4 text-sm shadow-[0_24px_80px_rgba(7,27,44,0.15)] backdrop-blur">
            {(gallery?.breadcrumbs ?? [{ name: "Home", prefix: "" }]).map((crumb, index) => (
              <span key={crumb.prefix} className="flex items-center gap-2">
                {index > 0 ? <span className="text-slate-400">&gt;</span> : null}
                <button
                  type="button"
                  onClick={() => navigateTo(crumb.prefix)}
                  className="font-medium text-sky-800 hover:underline"
                >
                  {crumb.name}
                </button>
              </span>
            ))}
            {gallery?.parentPrefix != null ? (
              <button
                type="button"
                onClick={() => navigateTo(gallery.parentPrefix ?? "")}
                className="ml-auto rounded-lg border border-slate-300 px-3 py-1.5 text-xs font-semibold text-slate-700 transition hover:bg-slate-50"
              >
                Back to parent
              </button>
            ) : null}
          </nav>

          {gallery?.warnings.map((warning) => (
            <div key={warning} className="rounded-2xl border border-amber-200 bg-amber-50 px-4 py-3 text-sm text-amber-900">
              {warning}
            </div>
          ))}

          {gallery && gallery.folders.length > 0 ? (
            <article className="rounded-3xl border border-white/20 bg-white/75 p-5 shadow-[0_24px_80px_rgba(7,27,44,0.15)] backdrop-blur sm:p-6">
              <h2 className="text-lg font-semibold text-slate-900">Folders</h2>
              <div className="mt-4 grid grid-cols-2 gap-3 sm:grid-cols-4">
                {gallery.folders.map((folder) => (
                  <button
                    key={folder.path}
                    type="button"
                    onClick={() => navigateTo(folder.path)}
                    className="truncate rounded-xl border border-slate-200 bg-white px-3 py-2 text-left text-sm font-medium text-slate-800 shadow-sm transition hover:bg-slate-50"
                  >
                    {folder.name}
                  </button>
                ))}
              </div>
            </article>
          ) : null}

          <article className="rounded-3xl border border-white/20 bg-white/75 p-5 shadow-[0_24px_80px_rgba(7,27,44,0.15)] backdrop-blur sm:p-6">
            <div className="mb-4 flex flex-wrap items-center justify-between gap-3">
              <h2 className="text-lg font-semibold text-slate-900">Images</h2>
              <label className="flex items-center gap-2 text-xs text-slate-700">
                Images per page
                <select
                  value={pageSize ?? ""}
                  onChange={(event) => {
                    setPageSize(Number(event.target.value));
                    setPage(0);
                  }}
                  className="rounded-lg border border-slate-300 bg-white px-2 py-1"
                >
                  {PAGE_SIZE_OPTIONS.map((option) => (
                    <option key={option} value={option}>
                      {option}
                    </option>
                  ))}
                </select>
              </label>
            </div>

            {!gallery || gallery.totalCount === 0 ? (
              <p className="rounded-xl border border-dashed border-slate-300 bg-slate-50 px-4 py-6 text-center text-sm text-slate-600">
                No images found in this folder.
              </p>
            ) : (
              <>
                <div className="mb-4 flex flex-wrap items-center justify-center gap-3 text-sm text-slate-700">
                  <button
                    type="button"
                    onClick={() => setPage(Math.max(0, gallery.page - 1))}
                    disabled={gallery.page === 0}
                    className="rounded-lg border border-slate-300 px-3 py-1.5 text-xs font-semibold transition hover:bg-slate-50 disabled:opacity-50"
                  >
                    Previous
                  </button>
                  <span>
                    Page {gallery.page + 1} of {gallery.totalPages} | {gallery.totalCount} images total
                  </span>
                  <button
                    type="button"
                    onClick={() => setPage(Math.min(gallery.totalPages - 1, gallery.page + 1))}
                    disabled={gallery.page >= gallery.totalPages - 1}
                    className="rounded-lg border border-slate-300 px-3 py-1.5 text-xs font-semibold transition hover:bg-slate-50 disabled:opacity-50"
                  >
                    Next
                  </button>
                </div>

                <ul className="grid grid-cols-2 gap-4 sm:grid-cols-4">
                  {gallery.images.map((image) => (
                    <ImageCard key={image.key} image={image} onOpen={setFullscreen} />
                  ))}
                </ul>
              </>
            )}
          </article>
        </section>
      )}

      {fullscreen ? (
        <div
          role="dialog"
          aria-modal="true"
          className="fixed inset-0 z-50 flex flex-col items-center justify-center gap-3 bg-slate-950/90 p-4"
          onClick={() => setFullscreen(null)}
        >
          {/* eslint-disable-next-line @next/next/no-img-element */}
          <img
            alt={fullscreen.filename}
            src={thumbnailUrl(fullscreen.key, "fullscreen")}
            className="max-h-[85vh] max-w-full rounded-lg object-contain"
          />
          <div className="flex items-center gap-3 text-sm text-slate-100">
            <span>{fullscreen.filename}</span>
            <a
              href={downloadUrl(fullscreen.key)}
              onClick={(event) => event.stopPropagation()}
              className="rounded-lg bg-sky-700 px-3 py-1.5 text-xs font-semibold text-white transition hover:bg-sky-800"
            >
              Download
            </a>
            <button
              type="button"
              onClick={() => setFullscreen(null)}
              className="rounded-lg border border-slate-500 px-3 py-1.5 text-xs font-semibold"
            >
              Close
            </button>
          </div>
        </div>
      ) : null}
    </div>
  );
}
