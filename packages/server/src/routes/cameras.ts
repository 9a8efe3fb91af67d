import { Hono } from "hono";
import { listCameras } from "@cliparchive/core/snapshot";
import type { ClipSource } from "@cliparchive/core/source";

export interface CameraRouteDeps {
  source: ClipSource;
}

export function cameraRoutes(deps: CameraRouteDeps): Hono {
  const app = new Hono();

  // GET /get-camera-info: raw vendor attributes of every camera
  app.get("/get-camera-info", async (c) => {
    const cameras = await listCameras(deps.source);
    return c.json({ cameras: cameras.map((camera) => camera.attributes) });
  });

  return app;
}
