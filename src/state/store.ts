// pattern: Imperative Shell
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { z } from "zod/v3";

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "not a valid timestamp");

const publishStateSchema = z.record(z.string(), z.record(z.string(), isoTimestamp));

/** source → category → ISO-8601 time of the last published item. */
export type PublishState = Readonly<Record<string, Readonly<Record<string, string>>>>;

export type PublishStateStore = {
  /** Current persisted state; empty when the file is missing or unreadable. */
  load(): Promise<PublishState>;
  /**
   * Records `publishedAt` as the watermark for (source, category) and
   * rewrites the file. Never throws: write failures are logged. A timestamp
   * older than the stored one is refused.
   */
  update(source: string, category: string, publishedAt: Date): Promise<void>;
};

export function getWatermark(
  state: PublishState,
  source: string,
  category: string,
): Date | null {
  const stored = state[source]?.[category];
  return stored === undefined ? null : new Date(stored);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Creates the store for per-(source, category) publish watermarks kept in a JSON file.
 *
 * @param path - Location of the state file; its directory is created on first write
 * @param logger - Logger instance for unreadable files and failed writes
 * @returns A PublishStateStore with serialized, monotonic updates
 */
export function createPublishStateStore(path: string, logger: Logger): PublishStateStore {
  // updates run one at a time so concurrent jobs never interleave writes
  let pending: Promise<void> = Promise.resolve();
  let writeCount = 0;

  async function load(): Promise<PublishState> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        logger.debug({ path }, "no publish state yet, starting empty");
      } else {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ path, error: message }, "failed to read publish state, starting empty");
      }
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ path, error: message }, "publish state is not valid JSON, starting empty");
      return {};
    }

    const parsed = publishStateSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      logger.warn({ path, issues }, "publish state has an unexpected shape, starting empty");
      return {};
    }
    return parsed.data;
  }

  async function persist(state: PublishState): Promise<void> {
    writeCount += 1;
    const tmpPath = `${path}.${process.pid}.${writeCount}.tmp`;
    await mkdir(dirname(path), { recursive: true });
    try {
      await writeFile(tmpPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  async function apply(source: string, category: string, publishedAt: Date): Promise<void> {
    const timestamp = publishedAt.toISOString();
    try {
      const state = await load();
      const current = getWatermark(state, source, category);

      if (current !== null && current.getTime() > publishedAt.getTime()) {
        logger.warn(
          { source, category, stored: current.toISOString(), attempted: timestamp },
          "refusing to move publish watermark backwards",
        );
        return;
      }

      await persist({
        ...state,
        [source]: { ...state[source], [category]: timestamp },
      });
      logger.info({ source, category, publishedAt: timestamp }, "publish state updated");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { path, source, category, publishedAt: timestamp, error: message },
        "failed to persist publish state",
      );
    }
  }

  return {
    load,
    update(source, category, publishedAt) {
      pending = pending.then(() => apply(source, category, publishedAt));
      return pending;
    },
  };
}
