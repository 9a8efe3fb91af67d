import { describe, it, expect, vi } from "vitest";
import type { ClipSession } from "./interface.js";
import type { ClipRef } from "./types.js";
import { throttleFetches } from "./throttle.js";

function makeMockSession(calls: string[]): ClipSession {
  return {
    listCameras: vi.fn().mockResolvedValue([]),
    listClips: vi.fn().mockResolvedValue([]),
    requestSnapshot: vi.fn().mockResolvedValue(undefined),
    fetchThumbnail: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
    fetch: vi.fn(async (clip: ClipRef) => {
      calls.push(`fetch:${clip.id}`);
    }),
  };
}

const clip = (id: string): ClipRef => ({
  id,
  cameraName: "porch",
  createdAt: "2025-06-02T12:00:00Z",
  mediaUrl: `/media/${id}.mp4`,
});

describe("throttleFetches", () => {
  it("waits between fetches but not before the first", async () => {
    const calls: string[] = [];
    const wait = vi.fn(async (ms: number) => {
      calls.push(`wait:${ms}`);
    });
    const session = throttleFetches(makeMockSession(calls), 2000, wait);

    await session.fetch(clip("1"), "/tmp/1");
    await session.fetch(clip("2"), "/tmp/2");
    await session.fetch(clip("3"), "/tmp/3");

    expect(calls).toEqual([
      "fetch:1",
      "wait:2000",
      "fetch:2",
      "wait:2000",
      "fetch:3",
    ]);
  });

  it("never waits when the delay is zero", async () => {
    const calls: string[] = [];
    const wait = vi.fn(async () => undefined);
    const session = throttleFetches(makeMockSession(calls), 0, wait);

    await session.fetch(clip("1"), "/tmp/1");
    await session.fetch(clip("2"), "/tmp/2");

    expect(wait).not.toHaveBeenCalled();
  });

  it("passes other calls through", async () => {
    const inner = makeMockSession([]);
    const session = throttleFetches(inner, 2000, vi.fn());

    await session.listClips("porch", new Date(0));
    await session.close();

    expect(inner.listClips).toHaveBeenCalledWith("porch", new Date(0));
    expect(inner.close).toHaveBeenCalledTimes(1);
  });
});
