import { writeClipFile } from "../files.js";
import type { ClipSource } from "../interface.js";
import { ALL_CAMERAS, type ClipRef } from "../types.js";
import { openBlinkClient, type CredentialsProvider } from "./session.js";

export interface BlinkClipSourceOptions {
  loadCredentials: CredentialsProvider;
  /** Stop paging through changed media after this many pages */
  maxMediaPages: number;
}

/**
 * Clip source backed by the account's cloud media list. Pages through
 * changed media until an empty page or `maxMediaPages`, skipping deleted
 * items; camera and `since` are filtered here as well as upstream.
 */
export function createBlinkClipSource(
  options: BlinkClipSourceOptions,
): ClipSource {
  return {
    async openSession() {
      const { client, core } = await openBlinkClient(options.loadCredentials);

      return {
        ...core,

        async listClips(selector, since) {
          const clips: ClipRef[] = [];
          for (let page = 1; page <= options.maxMediaPages; page++) {
            const media = await client.listChangedMedia(since, page);
            if (media.length === 0) break;

            for (const item of media) {
              if (item.deleted) continue;
              if (selector !== ALL_CAMERAS && item.device_name !== selector) continue;
              if (Date.parse(item.created_at) < since.getTime()) continue;
              clips.push({
                id: item.id,
                cameraName: item.device_name,
                createdAt: item.created_at,
                mediaUrl: item.media,
                networkId: item.network_id,
              });
            }
          }
          return clips;
        },

        async fetch(clip, destPath) {
          const bytes = await client.download(clip.mediaUrl);
          await writeClipFile(destPath, bytes, new Date(clip.createdAt));
        },
      };
    },
  };
}
