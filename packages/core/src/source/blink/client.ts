/**
 * Minimal REST client for the Blink cloud API.
 *
 * Only the calls the archive needs: homescreen (devices), changed media,
 * thumbnails, and the sync module local-storage manifest. Vendor payloads are
 * validated with zod; anything unexpected is a TransportError.
 *
 * Status mapping: 401/403 → AuthError, other non-2xx → TransportError,
 * network failure → TransportError.
 */

import { z } from "zod";
import { AuthError, TransportError } from "../../errors/catalog.js";
import type { CameraInfo } from "../types.js";
import { restBaseUrl, type BlinkCredentials } from "./credentials.js";

const IdSchema = z
  .union([z.number().int(), z.string().min(1)])
  .transform((value) => String(value));

const DeviceSchema = z.looseObject({
  id: IdSchema,
  name: z.string(),
  network_id: IdSchema,
  thumbnail: z.string().nullable().optional(),
});

const SyncModuleSchema = z.looseObject({
  id: IdSchema,
  name: z.string().optional(),
  network_id: IdSchema,
  local_storage_enabled: z.boolean().optional(),
});

export const HomescreenSchema = z.looseObject({
  sync_modules: z.array(SyncModuleSchema).default([]),
  cameras: z.array(DeviceSchema).default([]),
  owls: z.array(DeviceSchema).default([]),
  doorbells: z.array(DeviceSchema).default([]),
});

const MediaItemSchema = z.looseObject({
  id: IdSchema,
  created_at: z.string(),
  device_name: z.string(),
  media: z.string(),
  deleted: z.boolean().default(false),
  network_id: IdSchema.optional(),
});

export const MediaPageSchema = z.looseObject({
  media: z.array(MediaItemSchema).default([]),
});

const ManifestRequestSchema = z.looseObject({
  id: IdSchema,
});

const ManifestClipSchema = z.looseObject({
  id: IdSchema,
  camera_name: z.string(),
  created_at: z.string(),
});

export const ManifestSchema = z.looseObject({
  manifest_id: IdSchema.optional(),
  clips: z.array(ManifestClipSchema).default([]),
});

export type Homescreen = z.output<typeof HomescreenSchema>;
export type SyncModule = z.output<typeof SyncModuleSchema>;
export type MediaItem = z.output<typeof MediaItemSchema>;
export type ManifestClip = z.output<typeof ManifestClipSchema>;

export interface ReadyManifest {
  manifestId: string;
  clips: ManifestClip[];
}

export interface BlinkClient {
  getHomescreen(): Promise<Homescreen>;
  listChangedMedia(since: Date, page: number): Promise<MediaItem[]>;
  requestThumbnail(camera: CameraInfo): Promise<void>;
  requestManifest(module: SyncModule): Promise<string>;
  /** null until the sync module has finished building the manifest */
  getManifest(module: SyncModule, requestId: string): Promise<ReadyManifest | null>;
  /** URL path of a clip in a sync module's local storage */
  localClipPath(module: SyncModule, manifestId: string, clipId: string): string;
  /** Ask the sync module to upload a local-storage clip. */
  requestLocalClip(path: string): Promise<void>;
  /** GET a path (absolute or relative to the REST host) as bytes */
  download(path: string): Promise<Uint8Array>;
}

export interface BlinkClientOptions {
  credentials: BlinkCredentials;
  /** Aborts every in-flight request when the session closes */
  signal?: AbortSignal;
}

export function createBlinkClient(options: BlinkClientOptions): BlinkClient {
  const { credentials, signal } = options;
  const base = restBaseUrl(credentials.host);
  const account = `/api/v1/accounts/${credentials.account_id}`;

  function urlFor(path: string): string {
    return /^https?:\/\//.test(path) ? path : `${base}${path}`;
  }

  async function request(method: "GET" | "POST", path: string): Promise<Response> {
    if (signal?.aborted) {
      throw new TransportError("Session is closed");
    }

    let res: Response;
    try {
      res = await fetch(urlFor(path), {
        method,
        headers: {
          Authorization: `Bearer ${credentials.token}`,
          "Content-Type": "application/json",
        },
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new TransportError("Session is closed", { path });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Blink request failed: ${reason}`, {
        method,
        path,
      });
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(`Blink rejected credentials: ${res.status}`, { path });
    }
    if (!res.ok) {
      throw new TransportError(`Blink error: ${res.status} ${res.statusText}`, {
        method,
        path,
        status: res.status,
      });
    }
    return res;
  }

  async function json<S extends z.ZodType>(
    method: "GET" | "POST",
    path: string,
    schema: S,
  ): Promise<z.output<S>> {
    const res = await request(method, path);
    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new TransportError("Blink returned a non-JSON response", { path });
    }
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new TransportError("Unexpected response from Blink", {
        path,
        issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    return result.data;
  }

  function localStoragePath(module: SyncModule): string {
    return `${account}/networks/${module.network_id}/sync_modules/${module.id}/local_storage`;
  }

  return {
    getHomescreen() {
      return json(
        "GET",
        `/api/v3/accounts/${credentials.account_id}/homescreen`,
        HomescreenSchema,
      );
    },

    async listChangedMedia(since, page) {
      const query = new URLSearchParams({
        since: since.toISOString(),
        page: String(page),
      });
      const result = await json("GET", `${account}/media/changed?${query}`, MediaPageSchema);
      return result.media;
    },

    async requestThumbnail(camera) {
      const paths: Record<CameraInfo["type"], string> = {
        camera: `/network/${camera.networkId}/camera/${camera.id}/thumbnail`,
        owl: `${account}/networks/${camera.networkId}/owls/${camera.id}/thumbnail`,
        doorbell: `${account}/networks/${camera.networkId}/doorbells/${camera.id}/thumbnail`,
      };
      await request("POST", paths[camera.type]);
    },

    async requestManifest(module) {
      const result = await json(
        "POST",
        `${localStoragePath(module)}/manifest/request`,
        ManifestRequestSchema,
      );
      return result.id;
    },

    async getManifest(module, requestId) {
      const result = await json(
        "GET",
        `${localStoragePath(module)}/manifest/request/${requestId}`,
        ManifestSchema,
      );
      if (result.manifest_id === undefined) {
        return null;
      }
      return { manifestId: result.manifest_id, clips: result.clips };
    },

    localClipPath(module, manifestId, clipId) {
      return `${localStoragePath(module)}/manifest/${manifestId}/clip/request/${clipId}`;
    },

    async requestLocalClip(path) {
      await request("POST", path);
    },

    async download(path) {
      const res = await request("GET", path);
      return new Uint8Array(await res.arrayBuffer());
    },
  };
}

/** Flatten homescreen device lists into CameraInfo records. */
export function camerasFromHomescreen(homescreen: Homescreen): CameraInfo[] {
  const groups: [CameraInfo["type"], Homescreen["cameras"]][] = [
    ["camera", homescreen.cameras],
    ["owl", homescreen.owls],
    ["doorbell", homescreen.doorbells],
  ];

  return groups.flatMap(([type, devices]) =>
    devices.map((device) => ({
      id: device.id,
      name: device.name,
      networkId: device.network_id,
      type,
      thumbnail: device.thumbnail ?? null,
      attributes: { ...device, type },
    })),
  );
}
