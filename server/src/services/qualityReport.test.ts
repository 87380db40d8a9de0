import fs from 'fs'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { renderQualityReport, generateQualityReport, reportFileName } from './qualityReport'
import type { ProducedFile } from './transcode'
import { defaultRegistry } from '../models/Profile'
import { PackagingError } from '../utils/errors'
import { makeTempDir } from '../test-support/fakes'

function produced(name: string, sizeBytes: number): ProducedFile {
  const profile = defaultRegistry.require(name)
  return { profile, path: `/out/x.${profile.containerExtension}`, sizeBytes }
}

describe('renderQualityReport', () => {
  it('groups by tier and formats sizes in MB', () => {
    const text = renderQualityReport('Test Song', [produced('MP3 128kbps', 3250586), produced('FLAC (Lossless)', 31666995)])
    expect(text).toBe(
      [
        'Audio Quality Report for: Test Song',
        '='.repeat(50),
        '',
        'Lossless:',
        '-'.repeat(20),
        '  FLAC (Lossless)      |   30.2 MB | .flac',
        '',
        'Medium Quality:',
        '-'.repeat(20),
        '  MP3 128kbps          |    3.1 MB | .mp3',
        '',
        '',
      ].join('\n')
    )
  })

  it('orders a tier largest first and keeps selection order for ties', () => {
    const text = renderQualityReport('T', [
      produced('AAC 256kbps', 1048576),
      produced('MP3 320kbps', 5242880),
      produced('OGG 320kbps', 1048576),
    ])
    const lines = text.split('\n').filter((l) => l.startsWith('  '))
    expect(lines).toEqual([
      '  MP3 320kbps          |    5.0 MB | .mp3',
      '  AAC 256kbps          |    1.0 MB | .aac',
      '  OGG 320kbps          |    1.0 MB | .ogg',
    ])
    expect(text).toContain('High Quality:\n')
    expect(text).not.toContain('Lossless:')
  })
})

describe('generateQualityReport', () => {
  it('writes the report beside the outputs', async () => {
    const dir = makeTempDir()
    const reportPath = await generateQualityReport(dir, 'Song', [produced('WAV (Lossless)', 2048)])
    expect(reportPath).toBe(path.join(dir, 'Song_quality_report.txt'))
    expect(fs.readFileSync(reportPath, 'utf8').split('\n')[0]).toBe('Audio Quality Report for: Song')
  })

  it('reports write failures as packaging errors', async () => {
    const missing = path.join(makeTempDir(), 'not-there')
    await expect(generateQualityReport(missing, 'Song', [])).rejects.toBeInstanceOf(PackagingError)
  })

  it('names the report after the title', () => {
    expect(reportFileName('My Song')).toBe('My Song_quality_report.txt')
  })
})
