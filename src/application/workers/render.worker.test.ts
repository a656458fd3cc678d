import { beforeEach, describe, expect, it } from "vitest";
import { join } from "path";
import type { RenderJobSpec } from "../../domain/entities/render-job";
import type { EncoderExit, IEncoder } from "../../domain/interfaces/iencoder";
import { InMemoryJobStore } from "../../infrastructure/database/in.memory.job.store";
import { RenderWorker, type RenderWorkerInput } from "./render.worker";

interface ScriptedLine {
  afterMs: number; // clock advance before the line is emitted
  line: string;
}

class FakeEncoder implements IEncoder {
  calls: string[][] = [];

  constructor(
    private readonly clock: { advance(ms: number): void },
    private readonly options: {
      available?: boolean;
      accelerator?: boolean;
      lines?: ScriptedLine[];
      exit?: EncoderExit;
      spawnError?: Error;
    } = {}
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.options.available ?? true;
  }

  async hasHardwareAccelerator(): Promise<boolean> {
    return this.options.accelerator ?? false;
  }

  async encode(args: string[], onDiagnosticLine: (line: string) => void): Promise<EncoderExit> {
    this.calls.push(args);
    if (this.options.spawnError) {
      throw this.options.spawnError;
    }
    for (const { afterMs, line } of this.options.lines ?? []) {
      this.clock.advance(afterMs);
      onDiagnosticLine(line);
    }
    return this.options.exit ?? { exitCode: 0, signal: null };
  }
}

class RecordingJobStore extends InMemoryJobStore {
  progress: Array<{ percent: number; etaLabel: string }> = [];

  async updateProgress(id: number, percent: number, etaLabel: string): Promise<void> {
    this.progress.push({ percent, etaLabel });
    return super.updateProgress(id, percent, etaLabel);
  }
}

class UploadStatusOutageStore extends RecordingJobStore {
  async updateUploadStatus(): Promise<boolean> {
    throw new Error("store unavailable");
  }
}

const start = new Date("2026-01-01T00:00:00.000Z");

function spec(overrides: Partial<RenderJobSpec> = {}): RenderJobSpec {
  return {
    videoSource: "/media/loop.mp4",
    audioSource: "/media/rain.mp3",
    targetDurationHours: 1,
    watermarkMode: "zoom_top_left",
    muteOriginal: true,
    title: "Rain for sleeping",
    description: "",
    tags: [],
    scheduledAt: new Date("2026-01-02T00:00:00.000Z"),
    ...overrides,
  };
}

function inputFor(jobId: number, job: RenderJobSpec): RenderWorkerInput {
  return {
    jobId,
    videoSource: job.videoSource,
    audioSource: job.audioSource,
    targetDurationHours: job.targetDurationHours,
    watermarkMode: job.watermarkMode,
    muteOriginal: job.muteOriginal,
  };
}

describe("RenderWorker", () => {
  let current: Date;
  const clock = {
    now: () => current,
    advance: (ms: number) => {
      current = new Date(current.getTime() + ms);
    },
  };
  let store: RecordingJobStore;

  beforeEach(() => {
    current = start;
    store = new RecordingJobStore(clock.now);
  });

  async function render(encoder: FakeEncoder, overrides: Partial<RenderJobSpec> = {}) {
    const job = spec(overrides);
    const jobId = await store.create(job);
    const worker = new RenderWorker(store, encoder, { outputDir: "/out", now: clock.now });
    const outcome = await worker.run(inputFor(jobId, job));
    return { jobId, outcome, worker, job };
  }

  it("renders, reports non-decreasing progress and waits for the schedule", async () => {
    const encoder = new FakeEncoder(clock, {
      lines: [
        { afterMs: 0, line: "Input #0, mov,mp4,m4a,3gp,3g2,mj2, from '/media/loop.mp4':" },
        { afterMs: 60_000, line: "frame=100 fps=50 size=1kB time=00:02:00.00 bitrate=1kbits/s speed=2x" },
        { afterMs: 10_000, line: "frame=101 fps=50 size=1kB time=00:01:00.00 bitrate=1kbits/s speed=2x" },
        { afterMs: 830_000, line: "frame=900 fps=50 size=9kB time=00:30:00.00 bitrate=1kbits/s speed=2x" },
      ],
    });

    const { jobId, outcome } = await render(encoder);
    const expectedArtifact = join("/out", `render_${jobId}_${start.getTime()}.mp4`);

    expect(outcome).toEqual({ ok: true, value: { outputArtifact: expectedArtifact } });
    expect(store.progress.map((entry) => entry.percent)).toEqual([3, 50, 100]);
    expect(store.progress[0].etaLabel).toBe("29m 00s left (ETA 2026-01-01T00:30:00.000Z)");
    expect(store.progress[2].etaLabel).toBe("done");

    const job = await store.get(jobId);
    expect(job?.renderStatus).toBe("success");
    expect(job?.uploadStatus).toBe("waiting_schedule");
    expect(job?.outputArtifact).toBe(expectedArtifact);
    expect(job?.progressPercent).toBe(100);
    expect(job?.log.map((entry) => entry.message)).toEqual([
      "Render started with software (libx264) encoder (libx264, preset ultrafast).",
      "Watermark mode zoom_top_left: cropping the bottom 86px and right 150px, rescaling to 1920x1080.",
      "Audio: original track muted, using the external track only.",
      "Render finished. Waiting for the scheduled upload time.",
    ]);

    const args = encoder.calls[0];
    expect(args.slice(args.indexOf("-t"), args.indexOf("-t") + 2)).toEqual(["-t", "3600"]);
    expect(args[args.length - 1]).toBe(expectedArtifact);
  });

  it("fails immediately when ffmpeg is missing and leaves the upload idle", async () => {
    const encoder = new FakeEncoder(clock, { available: false });
    const { jobId, outcome } = await render(encoder);

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.code).toBe("TOOL_UNAVAILABLE");
    expect(encoder.calls).toHaveLength(0);

    const job = await store.get(jobId);
    expect(job?.renderStatus).toBe("failed");
    expect(job?.uploadStatus).toBe("idle");
    expect(job?.log.map((entry) => entry.message)).toEqual([
      "Rendering failed: FFmpeg not found; nothing was rendered.",
    ]);
  });

  it("mixes both audio tracks when the original is not muted", async () => {
    const encoder = new FakeEncoder(clock);
    const { jobId } = await render(encoder, { muteOriginal: false, watermarkMode: "none" });

    const args = encoder.calls[0];
    expect(args[args.indexOf("-filter_complex") + 1]).toBe("[0:a][1:a]amix=inputs=2:duration=shortest[aout]");
    const job = await store.get(jobId);
    expect(job?.log[2].message).toBe("Audio: mixing the original and external tracks (ends with the shorter one).");
  });

  it("selects NVENC when an accelerator is present", async () => {
    const encoder = new FakeEncoder(clock, { accelerator: true });
    const { jobId } = await render(encoder);

    const args = encoder.calls[0];
    expect(args[args.indexOf("-c:v") + 1]).toBe("h264_nvenc");
    expect((await store.get(jobId))?.log[0].message).toBe(
      "Render started with hardware (NVIDIA NVENC) encoder (h264_nvenc, preset p1)."
    );
  });

  it("records the diagnostic tail when ffmpeg exits non-zero", async () => {
    const encoder = new FakeEncoder(clock, {
      lines: [
        { afterMs: 30_000, line: "frame=10 fps=5 size=1kB time=00:06:00.00 bitrate=1kbits/s speed=12x" },
        { afterMs: 0, line: "/media/loop.mp4: Invalid data found when processing input" },
      ],
      exit: { exitCode: 1, signal: null },
    });

    const { jobId, outcome } = await render(encoder);

    expect(!outcome.ok && outcome.error.code).toBe("ENCODE_FAILURE");
    expect(!outcome.ok && outcome.error.message).toBe("FFmpeg failed (exit code 1).");

    const job = await store.get(jobId);
    expect(job?.renderStatus).toBe("failed");
    expect(job?.uploadStatus).toBe("idle");
    expect(job?.outputArtifact).toBeUndefined();
    expect(job?.progressPercent).toBe(10);
    expect(job?.log[job.log.length - 1].message).toBe(
      "Rendering failed: FFmpeg failed (exit code 1).\n" +
        "frame=10 fps=5 size=1kB time=00:06:00.00 bitrate=1kbits/s speed=12x\n" +
        "/media/loop.mp4: Invalid data found when processing input"
    );
  });

  it("keeps only the last 20 diagnostic lines", async () => {
    const lines = Array.from({ length: 25 }, (_, index) => ({ afterMs: 0, line: `line ${index + 1}` }));
    const encoder = new FakeEncoder(clock, { lines, exit: { exitCode: 1, signal: null } });

    const { outcome } = await render(encoder);

    const detail = !outcome.ok ? outcome.error.detail : undefined;
    expect(detail?.split("\n")).toEqual(Array.from({ length: 20 }, (_, index) => `line ${index + 6}`));
  });

  it("treats a missing binary at spawn time as tool unavailable", async () => {
    const spawnError = Object.assign(new Error("spawn ffmpeg ENOENT"), { code: "ENOENT" });
    const { jobId, outcome } = await render(new FakeEncoder(clock, { spawnError }));

    expect(!outcome.ok && outcome.error.code).toBe("TOOL_UNAVAILABLE");
    const job = await store.get(jobId);
    expect(job?.renderStatus).toBe("failed");
    expect(job?.log[job.log.length - 1].message).toBe("Rendering failed: FFmpeg could not be started: spawn ffmpeg ENOENT");
  });

  it("refuses to render a job that is no longer pending", async () => {
    const encoder = new FakeEncoder(clock);
    const { jobId, worker, job } = await render(encoder);

    const second = await worker.run(inputFor(jobId, job));

    expect(!second.ok && second.error.code).toBe("ILLEGAL_TRANSITION");
    expect(encoder.calls).toHaveLength(1);
  });

  it("does not report a failure for a render that already succeeded", async () => {
    const outageStore = new UploadStatusOutageStore(clock.now);
    const job = spec();
    const jobId = await outageStore.create(job);
    const worker = new RenderWorker(outageStore, new FakeEncoder(clock), { outputDir: "/out", now: clock.now });

    const outcome = await worker.run(inputFor(jobId, job));

    expect(!outcome.ok && outcome.error.message).toBe("store unavailable");
    const stored = await outageStore.get(jobId);
    expect(stored?.renderStatus).toBe("success");
    expect(stored?.log.map((entry) => entry.message)).toEqual([
      "Render started with software (libx264) encoder (libx264, preset ultrafast).",
      "Watermark mode zoom_top_left: cropping the bottom 86px and right 150px, rescaling to 1920x1080.",
      "Audio: original track muted, using the external track only.",
    ]);
  });

  it("leaves a settled job untouched when ffmpeg is missing", async () => {
    const job = spec();
    const jobId = await store.create(job);
    await store.updateRenderStatus(jobId, "rendering");
    await store.updateRenderStatus(jobId, "success");
    const worker = new RenderWorker(store, new FakeEncoder(clock, { available: false }), { outputDir: "/out", now: clock.now });

    const outcome = await worker.run(inputFor(jobId, job));

    expect(!outcome.ok && outcome.error.code).toBe("ILLEGAL_TRANSITION");
    const stored = await store.get(jobId);
    expect(stored?.renderStatus).toBe("success");
    expect(stored?.log).toEqual([]);
  });
});
