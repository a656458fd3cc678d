import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { stopServices } from "./service.shutdown";

describe("stopServices", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("waits for in-flight uploads before closing the store", async () => {
    const calls: string[] = [];
    let finishUpload: () => void = () => undefined;
    const upload = new Promise<void>((resolve) => {
      finishUpload = resolve;
    });

    const stopping = stopServices({
      server: {
        close: (callback) => {
          calls.push("server.close");
          callback();
        },
      },
      uploadScheduler: {
        stop: () => {
          calls.push("scheduler.stop");
        },
        drain: async () => {
          calls.push("scheduler.drain");
          await upload;
          calls.push("uploads settled");
        },
      },
      mongo: {
        close: async () => {
          calls.push("mongo.close");
        },
      },
    });

    await vi.waitFor(() => expect(calls).toContain("scheduler.drain"));
    expect(calls).not.toContain("mongo.close");

    finishUpload();
    await stopping;

    expect(calls).toEqual(["scheduler.stop", "server.close", "scheduler.drain", "uploads settled", "mongo.close"]);
  });

  it("logs a server close error and still shuts down", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const drain = vi.fn(async () => undefined);

    await stopServices({
      server: { close: (callback) => callback(new Error("not running")) },
      uploadScheduler: { stop: () => undefined, drain },
      mongo: null,
    });

    expect(drain).toHaveBeenCalledOnce();
    expect(console.error).toHaveBeenCalledWith("Error while closing HTTP server:", expect.any(Error));
  });
});
