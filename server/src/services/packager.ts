import fs from 'fs'
import path from 'path'
import archiver from 'archiver'
import type { ProducedFile } from './transcode'
import { PackagingError, errorMessage } from '../utils/errors'

export function archiveFileName(title: string): string {
  return `${title}_audio_collection.zip`
}

export interface PackagedArchive {
  archivePath: string
  sizeBytes: number
  entries: string[]
}

/**
 * Zip every produced file plus the report, flat (base names only).
 * Every constituent is checked first: a file that vanished since encoding fails the whole package.
 */
export async function packageOutputs(
  outputDir: string,
  title: string,
  produced: readonly ProducedFile[],
  reportPath: string
): Promise<PackagedArchive> {
  const sources = [...produced.map((f) => f.path), reportPath]
  for (const source of sources) {
    try {
      await fs.promises.access(source, fs.constants.R_OK)
    } catch (err) {
      throw new PackagingError(`${path.basename(source)} disappeared before packaging`, { cause: err })
    }
  }

  const archivePath = path.join(outputDir, archiveFileName(title))
  const entries = sources.map((s) => path.basename(s))
  const output = fs.createWriteStream(archivePath)
  const archive = archiver('zip', { zlib: { level: 9 } })

  const sizeBytes = await new Promise<number>((resolve, reject) => {
    output.on('close', () => resolve(archive.pointer()))
    output.on('error', reject)
    archive.on('error', reject)
    archive.pipe(output)
    for (const source of sources) {
      archive.file(source, { name: path.basename(source) })
    }
    archive.finalize().catch(reject)
  }).catch((err: unknown) => {
    throw new PackagingError(`Could not create archive: ${errorMessage(err)}`, { cause: err })
  })

  return { archivePath, sizeBytes, entries }
}
