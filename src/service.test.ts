import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import type { TelegramPoster } from "./delivery";
import type { Secrets } from "./config";
import { createTestConfig } from "./test-utils/config";

type Registered = {
  readonly callback: (tick: Date | "manual" | "init") => void;
  readonly options: { readonly name?: string };
};

const { registered } = vi.hoisted(() => ({ registered: [] as Array<Registered> }));

vi.mock("node-cron", () => ({
  default: {
    schedule: vi.fn(
      (
        _expression: string,
        callback: (tick: Date | "manual" | "init") => void,
        options: { name?: string },
      ) => {
        registered.push({ callback, options });
        return { start: vi.fn(), stop: vi.fn() };
      },
    ),
  },
}));

import { createService, jobIdFor } from "./service";

const secrets: Secrets = {
  telegramBotToken: "test-token",
  targetChannels: ["@news"],
  serviceChannels: ["@ops"],
};

describe("createService", () => {
  let tmpDir: string;
  let clock: Date;
  let poster: TelegramPoster;
  let sendServiceReport: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    registered.length = 0;
    tmpDir = mkdtempSync(join(tmpdir(), "service-test-"));
    clock = new Date("2026-10-19T08:00:00.000Z");
    sendServiceReport = vi.fn().mockResolvedValue(undefined);
    poster = { publishNews: vi.fn(), sendServiceReport };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function buildService(scheduler: { jitterSeconds: number; random: () => number } = {
    jitterSeconds: 0,
    random: () => 0,
  }) {
    const config = createTestConfig({
      scheduler: {
        jitterSeconds: scheduler.jitterSeconds,
        misfireGraceSeconds: 60,
        shutdownGraceSeconds: 5,
      },
      schedule: [
        { source: "decrypt", category: "Gaming", time: ["18:30", "09:00"] },
        { source: "beincrypto", category: "news", time: ["12:00", "25:00"] },
        { source: "cointelegraph", category: "news", time: ["10:00"] },
      ],
      paths: {
        stateFile: join(tmpDir, "publish-state.json"),
        tmpDir: join(tmpDir, "tmp"),
      },
    });

    return createService({
      config,
      secrets,
      logger: pino({ level: "silent" }),
      generator: { rewrite: vi.fn(), summarize: vi.fn() },
      poster,
      random: scheduler.random,
      now: () => clock,
    });
  }

  it("should register one job per valid source, category and time", () => {
    const service = buildService();

    const count = service.registerJobs();

    expect(count).toBe(3);
    expect(service.scheduler.jobIds()).toEqual([
      "decrypt:gaming:09:00",
      "decrypt:gaming:18:30",
      "beincrypto:news:12:00",
    ]);
  });

  it("should not duplicate jobs when the schedule is registered again", () => {
    const service = buildService();

    service.registerJobs();
    service.registerJobs();

    expect(service.scheduler.jobIds()).toHaveLength(3);
  });

  it("should send the job table to the service channels on start", async () => {
    const service = buildService();
    service.registerJobs();

    await service.start();

    expect(sendServiceReport).toHaveBeenCalledWith(
      [
        "Scheduled jobs (UTC):",
        "decrypt:gaming:09:00 at 09:00, next run 2026-10-19T09:00:00.000Z",
        "decrypt:gaming:18:30 at 18:30, next run 2026-10-19T18:30:00.000Z",
        "beincrypto:news:12:00 at 12:00, next run 2026-10-19T12:00:00.000Z",
      ].join("\n"),
    );
    expect(service.scheduler.isRunning()).toBe(true);
  });

  it("should run the pipeline when a trigger fires and report its outcome", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED")));
    const service = buildService();
    service.registerJobs();
    await service.start();
    sendServiceReport.mockClear();
    clock = new Date("2026-10-19T09:00:00.000Z");

    const trigger = registered.find((r) => r.options.name === "decrypt:gaming:09:00");
    trigger?.callback(new Date("2026-10-19T09:00:00.000Z"));
    await service.scheduler.drain(1000);

    expect(sendServiceReport).toHaveBeenCalledTimes(1);
    expect(sendServiceReport).toHaveBeenCalledWith("[decrypt/gaming] no fresh news");
  });

  it("should report a missed run to the service channels", async () => {
    const service = buildService();
    service.registerJobs();
    await service.start();
    sendServiceReport.mockClear();
    clock = new Date("2026-10-19T09:10:00.000Z");

    const trigger = registered.find((r) => r.options.name === "decrypt:gaming:09:00");
    trigger?.callback(new Date("2026-10-19T09:00:00.000Z"));
    await service.scheduler.drain(1000);

    expect(sendServiceReport).toHaveBeenCalledWith(
      "[decrypt:gaming:09:00] missed run scheduled for 2026-10-19T09:00:00.000Z (600s late)",
    );
  });

  it("should report a run cancelled by shutdown while it waited out its jitter", async () => {
    const service = buildService({ jitterSeconds: 30, random: () => 0.5 });
    service.registerJobs();
    await service.start();
    sendServiceReport.mockClear();
    clock = new Date("2026-10-19T09:00:00.000Z");

    const trigger = registered.find((r) => r.options.name === "decrypt:gaming:09:00");
    trigger?.callback(new Date("2026-10-19T09:00:00.000Z"));
    service.scheduler.shutdown();

    expect(await service.scheduler.drain(1000)).toBe(true);
    expect(sendServiceReport).toHaveBeenCalledTimes(1);
    expect(sendServiceReport).toHaveBeenCalledWith(
      "[decrypt:gaming:09:00] run cancelled by shutdown before it started",
    );
  });
});

describe("jobIdFor", () => {
  it("should combine source, category and zero-padded time", () => {
    expect(jobIdFor("decrypt", "gaming", { hour: 7, minute: 5 })).toBe("decrypt:gaming:07:05");
  });
});
