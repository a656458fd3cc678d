import { describe, expect, it } from "vitest";
import {
  canTransitionRender,
  canTransitionUpload,
  clampProgress,
  renderSourcesFor,
  uploadSourcesFor,
} from "./job-state.machine";

describe("render transitions", () => {
  it("allows the forward path and early failure", () => {
    expect(canTransitionRender("pending", "rendering")).toBe(true);
    expect(canTransitionRender("pending", "failed")).toBe(true);
    expect(canTransitionRender("rendering", "success")).toBe(true);
    expect(canTransitionRender("rendering", "failed")).toBe(true);
  });

  it("rejects skipping, going back and leaving terminal states", () => {
    expect(canTransitionRender("pending", "success")).toBe(false);
    expect(canTransitionRender("rendering", "pending")).toBe(false);
    expect(canTransitionRender("success", "rendering")).toBe(false);
    expect(canTransitionRender("failed", "pending")).toBe(false);
  });

  it("lists the states a move may start from", () => {
    expect(renderSourcesFor("failed")).toEqual(["pending", "rendering"]);
    expect(renderSourcesFor("rendering")).toEqual(["pending"]);
    expect(renderSourcesFor("pending")).toEqual([]);
  });
});

describe("upload transitions", () => {
  it("requires a successful render", () => {
    expect(canTransitionUpload("idle", "waiting_schedule", "rendering")).toBe(false);
    expect(canTransitionUpload("waiting_schedule", "uploading", "failed")).toBe(false);
    expect(canTransitionUpload("idle", "waiting_schedule", "success")).toBe(true);
  });

  it("follows idle -> waiting_schedule -> uploading -> success | failed", () => {
    expect(canTransitionUpload("waiting_schedule", "uploading", "success")).toBe(true);
    expect(canTransitionUpload("uploading", "success", "success")).toBe(true);
    expect(canTransitionUpload("uploading", "failed", "success")).toBe(true);
    expect(canTransitionUpload("idle", "uploading", "success")).toBe(false);
    expect(canTransitionUpload("waiting_schedule", "failed", "success")).toBe(false);
    expect(canTransitionUpload("success", "uploading", "success")).toBe(false);
  });

  it("lists the states a move may start from", () => {
    expect(uploadSourcesFor("uploading")).toEqual(["waiting_schedule"]);
    expect(uploadSourcesFor("failed")).toEqual(["uploading"]);
  });
});

describe("clampProgress", () => {
  it("floors and bounds the value", () => {
    expect(clampProgress(42.9)).toBe(42);
    expect(clampProgress(-3)).toBe(0);
    expect(clampProgress(150)).toBe(100);
    expect(clampProgress(Number.NaN)).toBe(0);
  });
});
