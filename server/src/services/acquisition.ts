import fs from 'fs/promises'
import path from 'path'
import type { JobState } from '../models/Job'
import type { Acquirer } from './capabilities'
import { AcquisitionError } from '../utils/errors'
import { sanitizeTitle } from '../utils/sanitizeFilename'

export interface AcquiredSource {
  title: string
  rawAudioPath: string
}

export const DOWNLOAD_PHASE = 'Downloading audio...'

/** Raw intermediate name: "{title}_temp.<ext>". The encoder stage never writes into workDir. */
export function rawStem(title: string): string {
  return `${title}_temp`
}

/**
 * Resolve the title, then pull the best audio stream into workDir as one raw file.
 * Moves the job through resolving -> acquiring and advances exactly one step on success.
 */
export async function acquire(
  acquirer: Acquirer,
  state: JobState,
  locator: string,
  workDir: string
): Promise<AcquiredSource> {
  await state.transition('resolving')
  await state.setPhase('Getting video information...')
  const meta = await acquirer.resolve(locator)
  if (!meta.ok) {
    throw new AcquisitionError(`Could not resolve ${locator}: ${meta.reason}`)
  }
  const title = sanitizeTitle(meta.value.title)
  await state.setTitle(title)
  await state.appendLog(`Video title: ${title}`)

  await state.transition('acquiring')
  await state.setPhase(DOWNLOAD_PHASE)
  await fs.mkdir(workDir, { recursive: true })
  const stem = rawStem(title)
  const fetched = await acquirer.fetch(locator, { workDir, fileStem: stem })
  if (!fetched.ok) {
    throw new AcquisitionError(`Download failed: ${fetched.reason}`)
  }

  const matches = (await fs.readdir(workDir)).filter((f) => f.startsWith(`${stem}.`)).sort()
  if (matches.length === 0) {
    throw new AcquisitionError('Failed to download audio file')
  }
  const rawAudioPath = path.join(workDir, matches[0])

  await state.advance(1, DOWNLOAD_PHASE)
  await state.appendLog(`Downloaded: ${matches[0]}`)
  return { title, rawAudioPath }
}
