import { join } from 'node:path'
import type { Logger } from 'pino'
import { NotFoundError } from '../errors/catalog.js'
import type { ClipSource } from '../source/interface.js'
import { sleep, type Sleep } from '../source/throttle.js'
import type { CameraInfo } from '../source/types.js'

export interface SnapshotDeps {
  source: ClipSource
  logger: Logger
  wait?: Sleep
}

export interface SnapshotOptions {
  mediaRoot: string
  lastImageFilename: string
  /** Time the camera needs to upload the new thumbnail */
  settleDelayMs: number
}

/** Every camera on the account, in one short-lived session. */
export async function listCameras(source: ClipSource): Promise<CameraInfo[]> {
  const session = await source.openSession()
  try {
    return await session.listCameras()
  } finally {
    await session.close()
  }
}

/**
 * Trigger a new still on `cameraName` and save it to
 * {mediaRoot}/{camera}/{lastImageFilename}. Returns the image path.
 * Waits `settleDelayMs` both before and after the snapshot request.
 */
export async function captureSnapshot(
  deps: SnapshotDeps,
  options: SnapshotOptions,
  cameraName: string,
): Promise<string> {
  const { source, logger } = deps
  const wait = deps.wait ?? sleep

  const session = await source.openSession()
  try {
    const find = async (): Promise<CameraInfo> => {
      const camera = (await session.listCameras()).find((c) => c.name === cameraName)
      if (!camera) throw new NotFoundError(cameraName)
      return camera
    }

    // let the account state settle before snapping, then again for the upload
    await find()
    await wait(options.settleDelayMs)
    await session.requestSnapshot(await find())
    await wait(options.settleDelayMs)

    // thumbnail path changes once the new image is uploaded
    const refreshed = await find()
    const imagePath = join(options.mediaRoot, cameraName, options.lastImageFilename)
    await session.fetchThumbnail(refreshed, imagePath)

    logger.info({ cameraName, path: imagePath }, 'Saved snapshot')
    return imagePath
  } finally {
    await session.close()
  }
}
