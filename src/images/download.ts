// pattern: Imperative Shell
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { USER_AGENT } from "../feeds/fetch";

export type TempDownload = {
  readonly path: string;
  readonly dir: string;
  readonly cleanup: () => Promise<void>;
};

export type DownloadOptions = {
  readonly tmpDir: string;
  readonly prefix?: string;
  readonly timeoutMs: number;
};

function fileNameFor(url: string): string {
  const name = basename(new URL(url).pathname);
  return name.length > 0 ? name : "download";
}

/**
 * Downloads `url` into a fresh directory under `tmpDir`. The caller owns the
 * directory and must call `cleanup`; on failure it is removed before the
 * error propagates.
 */
export async function downloadToTemp(
  url: string,
  options: DownloadOptions,
): Promise<TempDownload> {
  await mkdir(options.tmpDir, { recursive: true });
  const dir = await mkdtemp(join(options.tmpDir, options.prefix ?? "download-"));
  const cleanup = () => rm(dir, { recursive: true, force: true });

  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: { "User-Agent": USER_AGENT },
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const path = join(dir, fileNameFor(url));
    await writeFile(path, Buffer.from(await response.arrayBuffer()));
    return { path, dir, cleanup };
  } catch (err) {
    await cleanup();
    throw err;
  }
}
