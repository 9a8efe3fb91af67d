import { TransportError } from "../../errors/catalog.js";
import { writeClipFile } from "../files.js";
import type { ClipSession } from "../interface.js";
import type { BlinkCredentials } from "./credentials.js";
import {
  camerasFromHomescreen,
  createBlinkClient,
  type BlinkClient,
} from "./client.js";

export type CredentialsProvider = () => Promise<BlinkCredentials>;

/** Session calls shared by every Blink source; sources add listClips and fetch. */
export type BlinkSessionCore = Omit<ClipSession, "listClips" | "fetch">;

export interface OpenedBlinkClient {
  client: BlinkClient;
  core: BlinkSessionCore;
}

const IMAGE_EXTENSION = /\.(jpe?g|png)(\?|$)/i;

/**
 * Load credentials, prove them with a homescreen call, and return a client
 * bound to a fresh AbortController that `close()` fires.
 */
export async function openBlinkClient(
  loadCredentials: CredentialsProvider,
): Promise<OpenedBlinkClient> {
  const credentials = await loadCredentials();
  const controller = new AbortController();
  const client = createBlinkClient({ credentials, signal: controller.signal });

  try {
    await client.getHomescreen();
  } catch (err) {
    controller.abort();
    throw err;
  }

  const core: BlinkSessionCore = {
    async listCameras() {
      return camerasFromHomescreen(await client.getHomescreen());
    },

    async requestSnapshot(camera) {
      await client.requestThumbnail(camera);
    },

    async fetchThumbnail(camera, destPath) {
      if (!camera.thumbnail) {
        throw new TransportError(`No thumbnail available for ${camera.name}`, {
          cameraName: camera.name,
        });
      }
      const path = IMAGE_EXTENSION.test(camera.thumbnail)
        ? camera.thumbnail
        : `${camera.thumbnail}.jpg`;
      await writeClipFile(destPath, await client.download(path));
    },

    async close() {
      controller.abort();
    },
  };

  return { client, core };
}
