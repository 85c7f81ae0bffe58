// pattern: Imperative Shell
import { join } from "node:path";
import type { Logger } from "pino";
import { downloadToTemp } from "./download";
import type { TempDownload } from "./download";
import { prepareImage } from "./prepare";
import type { ImageSize } from "./prepare";

export type PreparedImage = {
  readonly path: string;
  readonly cleanup: () => Promise<void>;
};

/**
 * Fetches and converts an image for delivery. Resolves to null when the image
 * cannot be fetched or converted, so the post goes out text-only.
 */
export type ImagePreparer = (url: string) => Promise<PreparedImage | null>;

export type ImagePreparerOptions = {
  readonly tmpDir: string;
  readonly timeoutMs: number;
  readonly size: ImageSize;
  readonly logger: Logger;
};

export function createImagePreparer(options: ImagePreparerOptions): ImagePreparer {
  const { logger } = options;

  return async (url) => {
    let download: TempDownload;
    try {
      download = await downloadToTemp(url, {
        tmpDir: options.tmpDir,
        prefix: "image-",
        timeoutMs: options.timeoutMs,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ url, error: message }, "image download failed");
      return null;
    }

    try {
      const path = await prepareImage(
        download.path,
        join(download.dir, "prepared.jpg"),
        options.size,
      );
      logger.debug({ url, path }, "image prepared");
      return { path, cleanup: download.cleanup };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ url, error: message }, "image conversion failed");
      await download.cleanup();
      return null;
    }
  };
}
