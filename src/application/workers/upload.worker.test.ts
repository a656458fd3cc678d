import { beforeEach, describe, expect, it } from "vitest";
import { AuthUnavailableError, UploadTransportFailureError, err, ok, type Result } from "../../domain/errors/job.errors";
import type { ICredentialProvider, IVideoPlatform, VideoUploadRequest } from "../../domain/interfaces/ivideo.platform";
import { InMemoryJobStore } from "../../infrastructure/database/in.memory.job.store";
import { UploadWorker, type UploadWorkerInput } from "./upload.worker";

interface FakeSession {
  token: string;
}

class FakeCredentials implements ICredentialProvider<FakeSession> {
  constructor(private readonly result: Result<FakeSession, AuthUnavailableError>) {}

  async getSession(): Promise<Result<FakeSession, AuthUnavailableError>> {
    return this.result;
  }
}

class FakePlatform implements IVideoPlatform<FakeSession> {
  requests: Array<VideoUploadRequest<FakeSession>> = [];

  constructor(private readonly behaviour: { fractions?: number[]; videoId?: string; error?: Error }) {}

  async uploadVideo(request: VideoUploadRequest<FakeSession>): Promise<string> {
    this.requests.push(request);
    for (const fraction of this.behaviour.fractions ?? []) {
      request.onProgress?.(fraction);
    }
    if (this.behaviour.error) {
      throw this.behaviour.error;
    }
    return this.behaviour.videoId ?? "video-1";
  }
}

class RecordingJobStore extends InMemoryJobStore {
  progress: Array<{ percent: number; etaLabel: string }> = [];

  async updateProgress(id: number, percent: number, etaLabel: string): Promise<void> {
    this.progress.push({ percent, etaLabel });
    return super.updateProgress(id, percent, etaLabel);
  }
}

const session: FakeSession = { token: "test-access-token" };

describe("UploadWorker", () => {
  let store: RecordingJobStore;
  let input: UploadWorkerInput;

  beforeEach(async () => {
    store = new RecordingJobStore(() => new Date("2026-01-02T00:00:00.000Z"));
    const jobId = await store.create({
      videoSource: "/media/loop.mp4",
      audioSource: "/media/rain.mp3",
      targetDurationHours: 1,
      watermarkMode: "none",
      muteOriginal: true,
      title: "Rain for sleeping",
      description: "One hour of rain",
      tags: ["rain", "sleep"],
      scheduledAt: new Date("2026-01-02T00:00:00.000Z"),
    });
    await store.updateRenderStatus(jobId, "rendering");
    await store.setOutputArtifact(jobId, "/out/render_1.mp4");
    await store.updateRenderStatus(jobId, "success");
    await store.updateUploadStatus(jobId, "waiting_schedule");
    await store.updateUploadStatus(jobId, "uploading");

    input = {
      jobId,
      outputArtifact: "/out/render_1.mp4",
      title: "Rain for sleeping",
      description: "One hour of rain",
      tags: ["rain", "sleep"],
    };
  });

  function worker(credentials: FakeCredentials, platform: FakePlatform) {
    return new UploadWorker(store, credentials, platform, { categoryId: "22" });
  }

  it("uploads as a private video and records the external id", async () => {
    const platform = new FakePlatform({ fractions: [0.25, 0.1, 0.5, 1], videoId: "vid-123" });

    const outcome = await worker(new FakeCredentials(ok(session)), platform).run(input);

    expect(outcome).toEqual({ ok: true, value: { externalId: "vid-123" } });
    expect(platform.requests[0]).toMatchObject({
      session,
      filePath: "/out/render_1.mp4",
      metadata: {
        title: "Rain for sleeping",
        description: "One hour of rain",
        tags: ["rain", "sleep"],
        categoryId: "22",
        privacyStatus: "private",
        madeForKids: false,
      },
    });
    expect(store.progress).toEqual([
      { percent: 25, etaLabel: "uploading" },
      { percent: 50, etaLabel: "uploading" },
      { percent: 99, etaLabel: "uploading" },
      { percent: 100, etaLabel: "uploaded" },
    ]);

    const job = await store.get(input.jobId);
    expect(job?.uploadStatus).toBe("success");
    expect(job?.externalId).toBe("vid-123");
    expect(job?.log.map((entry) => entry.message)).toEqual(["Upload succeeded! Video ID: vid-123"]);
  });

  it("fails the upload when credentials are unavailable", async () => {
    const platform = new FakePlatform({});
    const credentials = new FakeCredentials(err(new AuthUnavailableError("Missing client_secrets.json. Cannot authenticate.")));

    const outcome = await worker(credentials, platform).run(input);

    expect(!outcome.ok && outcome.error.code).toBe("AUTH_UNAVAILABLE");
    expect(platform.requests).toHaveLength(0);

    const job = await store.get(input.jobId);
    expect(job?.uploadStatus).toBe("failed");
    expect(job?.renderStatus).toBe("success");
    expect(job?.log.map((entry) => entry.message)).toEqual([
      "Upload failed: Missing client_secrets.json. Cannot authenticate.",
    ]);
  });

  it("keeps the rendered file reference when the transfer fails", async () => {
    const platform = new FakePlatform({
      fractions: [0.3],
      error: new UploadTransportFailureError("Chunk upload rejected with HTTP 500"),
    });

    const outcome = await worker(new FakeCredentials(ok(session)), platform).run(input);

    expect(!outcome.ok && outcome.error.code).toBe("UPLOAD_TRANSPORT_FAILURE");
    const job = await store.get(input.jobId);
    expect(job?.uploadStatus).toBe("failed");
    expect(job?.externalId).toBeUndefined();
    expect(job?.outputArtifact).toBe("/out/render_1.mp4");
    expect(job?.progressPercent).toBe(30);
    expect(job?.log.map((entry) => entry.message)).toEqual([
      "Upload failed: Chunk upload rejected with HTTP 500. The rendered file is kept at /out/render_1.mp4 for manual resubmission.",
    ]);
  });

  it("wraps unexpected errors as transport failures", async () => {
    const platform = new FakePlatform({ error: new Error("socket hang up") });

    const outcome = await worker(new FakeCredentials(ok(session)), platform).run(input);

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error).toBeInstanceOf(UploadTransportFailureError);
    expect(!outcome.ok && outcome.error.message).toBe("socket hang up");
  });
});
