import path from 'path'
import { execFile } from 'child_process'
import { promisify } from 'util'
import { z } from 'zod'
import type { Acquirer, FetchTarget, Outcome, SourceMetadata, ToolCheck } from './capabilities'
import { failed, succeeded } from './capabilities'

const execFileAsync = promisify(execFile)

/** --dump-single-json output can be several MB for long videos. */
const MAX_BUFFER = 64 * 1024 * 1024

const infoSchema = z
  .object({
    title: z.string().optional(),
  })
  .passthrough()

export interface YtDlpOptions {
  /** yt-dlp executable (YTDLP_PATH), on PATH by default. */
  binary: string
  /** Passed as --ffmpeg-location so audio extraction uses the same ffmpeg as the encoder. */
  ffmpegPath?: string
}

function toolDiagnostic(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
    return err.stderr.trim()
  }
  return err instanceof Error ? err.message : String(err)
}

/**
 * Acquirer backed by the yt-dlp executable.
 * Works for YouTube and anything else yt-dlp has an extractor for, including direct media links.
 */
export class YtDlpAcquirer implements Acquirer {
  constructor(private readonly options: YtDlpOptions) {}

  async resolve(locator: string): Promise<Outcome<SourceMetadata>> {
    try {
      const { stdout } = await execFileAsync(
        this.options.binary,
        ['--dump-single-json', '--skip-download', '--no-playlist', '--no-warnings', locator],
        { maxBuffer: MAX_BUFFER }
      )
      const info = infoSchema.safeParse(JSON.parse(stdout))
      if (!info.success) return failed('yt-dlp returned metadata in an unexpected shape')
      return succeeded({ title: info.data.title ?? 'video' })
    } catch (err) {
      return failed(toolDiagnostic(err))
    }
  }

  async fetch(locator: string, target: FetchTarget): Promise<Outcome> {
    const args = [
      '-f', 'bestaudio/best',
      '--extract-audio',
      '--audio-format', 'wav',
      '--no-playlist',
      '--no-warnings',
      '-o', path.join(target.workDir, `${target.fileStem}.%(ext)s`),
    ]
    if (this.options.ffmpegPath) args.push('--ffmpeg-location', this.options.ffmpegPath)
    args.push(locator)
    try {
      await execFileAsync(this.options.binary, args, { maxBuffer: MAX_BUFFER })
      return succeeded(undefined)
    } catch (err) {
      return failed(toolDiagnostic(err))
    }
  }

  async check(): Promise<ToolCheck> {
    try {
      const { stdout } = await execFileAsync(this.options.binary, ['--version'])
      return { name: 'yt-dlp', available: true, version: stdout.trim() }
    } catch (err) {
      return { name: 'yt-dlp', available: false, error: toolDiagnostic(err) }
    }
  }
}
