import fs from 'fs/promises'
import path from 'path'
import { TIER_LABELS, TIER_ORDER } from '../models/Profile'
import type { ProducedFile } from './transcode'
import { PackagingError, errorMessage } from '../utils/errors'
import { formatMegabytes } from '../utils/size'

export function reportFileName(title: string): string {
  return `${title}_quality_report.txt`
}

/**
 * Plain-text report: one section per tier that produced something (lossless, high, medium),
 * largest file first within a tier. Equal sizes keep selection order.
 */
export function renderQualityReport(title: string, produced: readonly ProducedFile[]): string {
  let out = `Audio Quality Report for: ${title}\n`
  out += '='.repeat(50) + '\n\n'

  for (const tier of TIER_ORDER) {
    const files = produced
      .filter((f) => f.profile.qualityTier === tier)
      .sort((a, b) => b.sizeBytes - a.sizeBytes)
    if (files.length === 0) continue
    out += `${TIER_LABELS[tier]}:\n`
    out += '-'.repeat(20) + '\n'
    for (const f of files) {
      out += `  ${f.profile.name.padEnd(20)} | ${formatMegabytes(f.sizeBytes).padStart(6)} MB | .${f.profile.containerExtension}\n`
    }
    out += '\n'
  }
  return out
}

export async function generateQualityReport(
  outputDir: string,
  title: string,
  produced: readonly ProducedFile[]
): Promise<string> {
  const reportPath = path.join(outputDir, reportFileName(title))
  try {
    await fs.writeFile(reportPath, renderQualityReport(title, produced), 'utf8')
  } catch (err) {
    throw new PackagingError(`Could not write quality report: ${errorMessage(err)}`, { cause: err })
  }
  return reportPath
}
