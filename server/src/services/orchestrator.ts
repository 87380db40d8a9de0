import fs from 'fs/promises'
import path from 'path'
import type { Logger } from 'pino'
import type { JobSnapshot, JobState } from '../models/Job'
import type { Profile, ProfileRegistry } from '../models/Profile'
import type { Acquirer, Encoder } from './capabilities'
import { acquire } from './acquisition'
import { transcodeAll } from './transcode'
import { generateQualityReport } from './qualityReport'
import { packageOutputs } from './packager'
import { AllEncodesFailedError, toAppError } from '../utils/errors'
import { redactFilePath, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'

export interface OrchestratorDeps {
  acquirer: Acquirer
  encoder: Encoder
  registry: ProfileRegistry
}

/** Scratch directory for the raw intermediate, inside the job's output directory and removed before the job ends. */
export function workDirFor(outputDirectory: string, jobId: string): string {
  return path.join(outputDirectory, `.work-${jobId}`)
}

/**
 * Drives one job: resolving -> acquiring -> transcoding -> reporting -> packaging -> completed.
 * Any stage error ends in `failed`; single-profile encode errors never do.
 */
export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(state: JobState, requestId?: string): Promise<JobSnapshot> {
    const log = withJobContext(state.jobId, requestId)
    const { outputDirectory, profiles: names } = state.snapshot()
    const workDir = workDirFor(outputDirectory, state.jobId)
    log.info({ msg: 'Job started', profiles: names.length, output: redactFilePath(outputDirectory) })

    let archivePath: string | undefined
    let failure: unknown
    try {
      const profiles = names.map((n) => this.deps.registry.require(n))
      archivePath = await this.execute(state, profiles, workDir, log)
    } catch (err) {
      failure = err
    } finally {
      await removeWorkDir(workDir, log)
    }

    if (archivePath !== undefined && failure === undefined) {
      await state.succeed(archivePath)
      log.info({ msg: 'Job completed', outputs: state.snapshot().outputs.length })
    } else {
      const error = toAppError(failure)
      await state.appendLog(`Error: ${error.message}`)
      await state.fail({ code: error.code, message: error.message })
      log.error({ msg: 'Job failed', code: error.code, err: error.message })
      captureJobError(state.jobId, requestId, error.code, error)
    }
    return state.snapshot()
  }

  private async execute(state: JobState, profiles: Profile[], workDir: string, log: Logger): Promise<string> {
    const { locator, outputDirectory } = state.snapshot()
    await state.appendLog(`Starting conversion for ${profiles.length} formats...`)

    const source = await acquire(this.deps.acquirer, state, locator, workDir)
    const produced = await transcodeAll(
      this.deps.encoder,
      state,
      source.rawAudioPath,
      profiles,
      outputDirectory,
      source.title,
      log
    )
    await removeWorkDir(workDir, log)
    if (produced.length === 0) {
      throw new AllEncodesFailedError(profiles.map((p) => p.name))
    }

    await state.transition('reporting')
    await state.setPhase('Writing quality report...')
    const reportPath = await generateQualityReport(outputDirectory, source.title, produced)
    await state.appendLog(`Quality report saved: ${path.basename(reportPath)}`)

    await state.transition('packaging')
    await state.setPhase('Packaging files...')
    const archive = await packageOutputs(outputDirectory, source.title, produced, reportPath)
    await state.appendLog(`ZIP file created: ${path.basename(archive.archivePath)}`)
    log.info({ msg: 'Archive written', entries: archive.entries.length, sizeBytes: archive.sizeBytes })
    return archive.archivePath
  }
}

async function removeWorkDir(workDir: string, log: Logger): Promise<void> {
  try {
    await fs.rm(workDir, { recursive: true, force: true })
  } catch (err) {
    log.warn({ msg: 'Could not remove work directory', err })
  }
}
