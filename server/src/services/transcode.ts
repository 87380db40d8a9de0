import fs from 'fs/promises'
import path from 'path'
import type { Logger } from 'pino'
import type { JobState } from '../models/Job'
import type { Profile } from '../models/Profile'
import type { Encoder } from './capabilities'
import { EncodeError, errorMessage } from '../utils/errors'
import { profileSlug } from '../utils/sanitizeFilename'
import { formatMegabytes } from '../utils/size'

export interface ProducedFile {
  profile: Profile
  path: string
  sizeBytes: number
}

/**
 * File name stem per selected profile. Normally the title; profiles that share a container
 * extension get "{title}_{slug}" so one encode cannot overwrite another.
 */
export function planOutputStems(title: string, profiles: readonly Profile[]): Map<string, string> {
  const perExtension = new Map<string, number>()
  for (const p of profiles) {
    perExtension.set(p.containerExtension, (perExtension.get(p.containerExtension) ?? 0) + 1)
  }
  const stems = new Map<string, string>()
  for (const p of profiles) {
    const shared = (perExtension.get(p.containerExtension) ?? 0) > 1
    stems.set(p.name, shared ? `${title}_${profileSlug(p.name)}` : title)
  }
  return stems
}

/** Encode one profile. Throws EncodeError on any failure; never touches job state. */
export async function transcode(
  encoder: Encoder,
  rawAudioPath: string,
  profile: Profile,
  outputDir: string,
  stem: string
): Promise<ProducedFile> {
  const outputPath = path.join(outputDir, `${stem}.${profile.containerExtension}`)
  const outcome = await encoder.encode(rawAudioPath, outputPath, profile).catch((err: unknown) => {
    throw new EncodeError(profile.name, errorMessage(err), { cause: err })
  })
  if (!outcome.ok) throw new EncodeError(profile.name, outcome.reason)
  try {
    const stats = await fs.stat(outputPath)
    return { profile, path: outputPath, sizeBytes: stats.size }
  } catch (err) {
    throw new EncodeError(profile.name, 'encoder reported success but wrote no output file', { cause: err })
  }
}

/**
 * Run every selected profile in selection order. A failed profile is logged and skipped;
 * each attempt advances the job one step. Returns only the profiles that produced a file.
 */
export async function transcodeAll(
  encoder: Encoder,
  state: JobState,
  rawAudioPath: string,
  profiles: readonly Profile[],
  outputDir: string,
  title: string,
  log: Logger
): Promise<ProducedFile[]> {
  await state.transition('transcoding')
  await fs.mkdir(outputDir, { recursive: true })
  const stems = planOutputStems(title, profiles)
  const produced: ProducedFile[] = []

  for (const profile of profiles) {
    const phase = `Converting to ${profile.name}...`
    await state.setPhase(phase)
    let line: string
    try {
      const file = await transcode(encoder, rawAudioPath, profile, outputDir, stems.get(profile.name) ?? title)
      produced.push(file)
      line = `✓ Created: ${path.basename(file.path)} (${formatMegabytes(file.sizeBytes)} MB)`
      await state.recordOutput({
        profile: profile.name,
        qualityTier: profile.qualityTier,
        fileName: path.basename(file.path),
        sizeBytes: file.sizeBytes,
      })
      log.info({ msg: 'Profile encoded', profile: profile.name, sizeBytes: file.sizeBytes })
    } catch (err) {
      if (!(err instanceof EncodeError)) throw err
      line = `✗ ${err.message}`
      log.warn({ msg: 'Profile failed', profile: profile.name, stderr: err.stderr })
    }
    await state.advance(1, phase)
    await state.appendLog(line)
  }
  return produced
}
