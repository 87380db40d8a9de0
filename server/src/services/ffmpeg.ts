import ffmpeg from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import fs from 'fs'
import { execFile } from 'child_process'
import { promisify } from 'util'
import type { Profile, EncoderParams } from '../models/Profile'
import { ProfileRegistry, defaultRegistry } from '../models/Profile'
import type { Encoder, Outcome, ToolCheck } from './capabilities'
import { failed, succeeded } from './capabilities'

const execFileAsync = promisify(execFile)

// Explicit path: use env in Docker (e.g. /usr/bin/ffmpeg) if the file exists, else the npm installer binary
export function resolveFfmpegPath(envPath: string | undefined): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return ffmpegInstaller.path
}

export const STALLED_MESSAGE = 'ENCODER_STALLED'

export interface FfmpegEncoderOptions {
  ffmpegPath: string
  threads: number
  /** Kill the encode if ffmpeg reports no progress for this long. 0 disables. */
  stallMs: number
  registry?: ProfileRegistry
}

/** Output options for one profile: audio only, codec from the registry table, bitrate when the codec takes one. */
export function buildOutputOptions(params: EncoderParams, threads: number): string[] {
  const opts = ['-threads', String(threads), '-vn', '-codec:a', params.codec]
  if (params.bitrate) opts.push('-b:a', params.bitrate)
  return opts
}

/** Kill `cmd` once stallMs pass without a reset(); stallMs <= 0 disables the timer. */
export function setupStallProtection(
  cmd: { kill: (signal: string) => unknown },
  stallMs: number,
  onStall: () => void
): { clear: () => void; reset: () => void } {
  let timer: NodeJS.Timeout | undefined
  const clear = () => {
    if (timer) clearTimeout(timer)
  }
  const reset = () => {
    if (stallMs <= 0) return
    clear()
    timer = setTimeout(() => {
      try {
        cmd.kill('SIGKILL')
      } catch (_) {
        /* process already gone */
      }
      onStall()
    }, stallMs)
  }
  reset()
  return { clear, reset }
}

export class FfmpegEncoder implements Encoder {
  private readonly registry: ProfileRegistry

  constructor(private readonly options: FfmpegEncoderOptions) {
    this.registry = options.registry ?? defaultRegistry
    ffmpeg.setFfmpegPath(options.ffmpegPath)
  }

  encode(sourcePath: string, destPath: string, profile: Profile): Promise<Outcome> {
    const outputOptions = buildOutputOptions(this.registry.encoderParams(profile), this.options.threads)
    return new Promise((resolve) => {
      let settled = false
      const finish = (outcome: Outcome) => {
        if (settled) return
        settled = true
        stall.clear()
        resolve(outcome)
      }
      const cmd = ffmpeg(sourcePath)
        .outputOptions(outputOptions)
        .on('progress', () => stall.reset())
        .on('end', () => finish(succeeded(undefined)))
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          finish(failed(stderr?.trim() || err.message))
        })
      const stall = setupStallProtection(cmd, this.options.stallMs, () =>
        finish(failed(`${STALLED_MESSAGE}: no encoder output for ${this.options.stallMs}ms`))
      )
      cmd.save(destPath)
    })
  }

  async check(): Promise<ToolCheck> {
    try {
      const { stdout } = await execFileAsync(this.options.ffmpegPath, ['-version'])
      return { name: 'ffmpeg', available: true, version: stdout.split('\n')[0]?.trim() }
    } catch (err) {
      return { name: 'ffmpeg', available: false, error: err instanceof Error ? err.message : String(err) }
    }
  }
}
