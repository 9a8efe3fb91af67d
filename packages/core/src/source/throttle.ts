import type { ClipSession } from "./interface.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wrap a session so successive `fetch` calls are spaced `delayMs` apart.
 * The first fetch is not delayed. Other calls pass straight through.
 */
export function throttleFetches(
  session: ClipSession,
  delayMs: number,
  wait: Sleep = sleep,
): ClipSession {
  let fetched = false;

  return {
    listCameras: () => session.listCameras(),
    listClips: (selector, since) => session.listClips(selector, since),
    requestSnapshot: (camera) => session.requestSnapshot(camera),
    fetchThumbnail: (camera, destPath) =>
      session.fetchThumbnail(camera, destPath),
    close: () => session.close(),

    async fetch(clip, destPath) {
      if (fetched && delayMs > 0) {
        await wait(delayMs);
      }
      fetched = true;
      await session.fetch(clip, destPath);
    },
  };
}
