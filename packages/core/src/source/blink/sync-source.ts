import { TransportError } from "../../errors/catalog.js";
import { writeClipFile } from "../files.js";
import type { ClipSource } from "../interface.js";
import { sleep, type Sleep } from "../throttle.js";
import { ALL_CAMERAS, type ClipRef } from "../types.js";
import type { BlinkClient, SyncModule } from "./client.js";
import { openBlinkClient, type CredentialsProvider } from "./session.js";

export interface BlinkSyncModuleSourceOptions {
  loadCredentials: CredentialsProvider;
  /** Wait between manifest polls, and between a clip upload request and its download */
  pollIntervalMs: number;
  /** Give up on a manifest after this many polls */
  pollAttempts: number;
  wait?: Sleep;
}

async function pollManifest(
  client: BlinkClient,
  module: SyncModule,
  options: BlinkSyncModuleSourceOptions,
  wait: Sleep,
): Promise<ClipRef[]> {
  const requestId = await client.requestManifest(module);

  for (let attempt = 1; attempt <= options.pollAttempts; attempt++) {
    await wait(options.pollIntervalMs);
    const manifest = await client.getManifest(module, requestId);
    if (manifest) {
      return manifest.clips.map((clip) => ({
        id: clip.id,
        cameraName: clip.camera_name,
        createdAt: clip.created_at,
        mediaUrl: client.localClipPath(module, manifest.manifestId, clip.id),
        networkId: module.network_id,
      }));
    }
  }

  throw new TransportError(
    `Local storage manifest not ready after ${options.pollAttempts} attempts`,
    { syncModuleId: module.id },
  );
}

/**
 * Clip source backed by sync module local storage. The first listClips call
 * of a session builds a manifest per local-storage sync module; later calls
 * filter that cached manifest by camera and `since`.
 */
export function createBlinkSyncModuleSource(
  options: BlinkSyncModuleSourceOptions,
): ClipSource {
  const wait = options.wait ?? sleep;

  return {
    async openSession() {
      const { client, core } = await openBlinkClient(options.loadCredentials);
      let manifest: ClipRef[] | null = null;

      async function loadManifest(): Promise<ClipRef[]> {
        if (manifest) return manifest;

        const { sync_modules } = await client.getHomescreen();
        const clips: ClipRef[] = [];
        for (const module of sync_modules) {
          if (module.local_storage_enabled !== true) continue;
          clips.push(...(await pollManifest(client, module, options, wait)));
        }
        manifest = clips;
        return clips;
      }

      return {
        ...core,

        async listClips(selector, since) {
          const clips = await loadManifest();
          return clips.filter(
            (clip) =>
              (selector === ALL_CAMERAS || clip.cameraName === selector) &&
              Date.parse(clip.createdAt) >= since.getTime(),
          );
        },

        async fetch(clip, destPath) {
          await client.requestLocalClip(clip.mediaUrl);
          await wait(options.pollIntervalMs);
          const bytes = await client.download(clip.mediaUrl);
          await writeClipFile(destPath, bytes, new Date(clip.createdAt));
        },
      };
    },
  };
}
