/**
 * In-memory clip source for pipeline and route tests.
 * Clips live in an array the test can grow between runs; every session
 * call is recorded so tests can assert on side effects.
 */

import { writeClipFile } from "../source/files.js";
import type { ClipSession, ClipSource } from "../source/interface.js";
import {
  ALL_CAMERAS,
  type CameraInfo,
  type ClipRef,
} from "../source/types.js";
import { TransportError } from "../errors/catalog.js";

export interface FakeClip extends ClipRef {
  /** Bytes written by fetch (default: "clip:{id}") */
  content?: string;
}

export interface FakeClipSourceOptions {
  cameras?: CameraInfo[];
  clips?: FakeClip[];
  /** Return an error to make fetch of that clip fail */
  failFetch?: (clip: ClipRef) => Error | undefined;
  /** Thrown from openSession when set */
  openError?: Error;
}

export interface FakeClipSource extends ClipSource {
  cameras: CameraInfo[];
  clips: FakeClip[];
  readonly calls: {
    opened: number;
    closed: number;
    fetched: string[];
    snapshots: string[];
  };
}

export function fakeCamera(name: string, overrides: Partial<CameraInfo> = {}): CameraInfo {
  return {
    id: `id-${name}`,
    name,
    networkId: "net-1",
    type: "camera",
    thumbnail: `/thumb/${name}`,
    attributes: { name },
    ...overrides,
  };
}

export function fakeClip(cameraName: string, createdAt: string, id?: string): FakeClip {
  return {
    id: id ?? `${cameraName}-${createdAt}`,
    cameraName,
    createdAt,
    mediaUrl: `/media/${cameraName}/${createdAt}.mp4`,
  };
}

export function createFakeClipSource(options: FakeClipSourceOptions = {}): FakeClipSource {
  const calls: FakeClipSource["calls"] = { opened: 0, closed: 0, fetched: [], snapshots: [] };

  const fake: FakeClipSource = {
    cameras: options.cameras ?? [],
    clips: options.clips ?? [],
    calls,

    async openSession() {
      if (options.openError) throw options.openError;
      calls.opened++;
      let closed = false;

      function ensureOpen(): void {
        if (closed) throw new TransportError("Session is closed");
      }

      const session: ClipSession = {
        async listCameras() {
          ensureOpen();
          return fake.cameras.map((camera) => ({ ...camera }));
        },

        async listClips(selector, since) {
          ensureOpen();
          return fake.clips.filter(
            (clip) =>
              (selector === ALL_CAMERAS || clip.cameraName === selector) &&
              Date.parse(clip.createdAt) >= since.getTime(),
          );
        },

        async fetch(clip, destPath) {
          ensureOpen();
          const failure = options.failFetch?.(clip);
          if (failure) throw failure;
          const stored = fake.clips.find((c) => c.id === clip.id);
          const content = stored?.content ?? `clip:${clip.id}`;
          await writeClipFile(destPath, new TextEncoder().encode(content), new Date(clip.createdAt));
          calls.fetched.push(clip.id);
        },

        async requestSnapshot(camera) {
          ensureOpen();
          calls.snapshots.push(camera.name);
        },

        async fetchThumbnail(camera, destPath) {
          ensureOpen();
          if (!camera.thumbnail) {
            throw new TransportError(`No thumbnail available for ${camera.name}`);
          }
          await writeClipFile(destPath, new TextEncoder().encode(`image:${camera.thumbnail}`));
        },

        async close() {
          closed = true;
          calls.closed++;
        },
      };
      return session;
    },
  };

  return fake;
}
