import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { IoError, toError } from '../errors'
import { isPlainFilename, type ChartRequest } from '../models'
import { NoopLogger, type Logger } from '../utils'

/**
 * The rendered image on disk
 */
export interface Artifact {
  readonly path: string
  readonly ticker: string
  readonly timeframe: string
  /** Size of the PNG in bytes */
  readonly bytes: number
}

/**
 * `image_filename` when the caller supplied one, `{ticker}_{timeframe}.png` otherwise.
 * The fallback name is shared by every request for the same ticker and timeframe.
 */
export function resolveArtifactFilename(request: Pick<ChartRequest, 'ticker' | 'timeframe' | 'imageFilename'>): string {
  return request.imageFilename ?? `${request.ticker}_${request.timeframe}.png`
}

let tempCounter = 0

/**
 * Persists rendered charts under the configured output directory. Bytes go to a
 * temporary sibling first and are renamed into place, so a failed write never
 * leaves a truncated image behind.
 */
export class ArtifactWriter {
  constructor(
    readonly directory: string,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  /**
   * @throws IoError when the file name would leave the output directory
   */
  resolvePath(request: Pick<ChartRequest, 'ticker' | 'timeframe' | 'imageFilename'>): string {
    const filename = resolveArtifactFilename(request)
    const target = path.join(this.directory, filename)
    if (!isPlainFilename(filename)) {
      throw new IoError(`Chart file name ${JSON.stringify(filename)} is outside the output directory`, target)
    }
    return target
  }

  /**
   * @throws IoError when the directory cannot be created or written, or the file name leaves it
   */
  async write(request: ChartRequest, png: Uint8Array): Promise<Artifact> {
    const target = this.resolvePath(request)
    const temp = `${target}.${process.pid}.${++tempCounter}.tmp`

    try {
      await mkdir(path.dirname(target), { recursive: true })
      await writeFile(temp, png)
      await rename(temp, target)
    } catch (error) {
      await this.discard(temp)
      throw new IoError(
        `Failed to write chart to ${target}: ${error instanceof Error ? error.message : String(error)}`,
        target,
        toError(error)
      )
    }

    this.logger.debug('Artifact written', { path: target, bytes: png.byteLength })
    return { path: target, ticker: request.ticker, timeframe: request.timeframe, bytes: png.byteLength }
  }

  private async discard(temp: string): Promise<void> {
    try {
      await rm(temp, { force: true })
    } catch (error) {
      this.logger.warn('Failed to remove temporary chart file', { path: temp, error: toError(error).message })
    }
  }
}
