import fs from 'fs'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { YtDlpAcquirer } from './ytdlp'
import { makeTempDir } from '../test-support/fakes'

/** Shell script standing in for the yt-dlp executable. */
function fakeBinary(body: string): string {
  const bin = path.join(makeTempDir('fake-ytdlp-'), 'yt-dlp')
  fs.writeFileSync(bin, `#!/bin/sh\n${body}\n`, { mode: 0o755 })
  return bin
}

describe('YtDlpAcquirer', () => {
  it('reads the title from the metadata dump', async () => {
    const acquirer = new YtDlpAcquirer({ binary: fakeBinary(`echo '{"id":"abc","title":"Fake Title"}'`) })
    expect(await acquirer.resolve('https://example.test/v')).toEqual({ ok: true, value: { title: 'Fake Title' } })
  })

  it('falls back to "video" when the metadata has no title', async () => {
    const acquirer = new YtDlpAcquirer({ binary: fakeBinary(`echo '{"id":"abc"}'`) })
    expect(await acquirer.resolve('https://example.test/v')).toEqual({ ok: true, value: { title: 'video' } })
  })

  it('reports the tool stderr on failure', async () => {
    const acquirer = new YtDlpAcquirer({ binary: fakeBinary(`echo 'ERROR: Unsupported URL' >&2\nexit 1`) })
    expect(await acquirer.resolve('nope')).toEqual({ ok: false, reason: 'ERROR: Unsupported URL' })
  })

  it('passes the output template to the download', async () => {
    const dir = makeTempDir()
    const argsFile = path.join(dir, 'args.txt')
    const acquirer = new YtDlpAcquirer({
      binary: fakeBinary(`printf '%s\\n' "$@" > '${argsFile}'`),
      ffmpegPath: '/opt/ffmpeg',
    })
    const outcome = await acquirer.fetch('https://example.test/v', { workDir: dir, fileStem: 'Song_temp' })
    expect(outcome.ok).toBe(true)
    expect(fs.readFileSync(argsFile, 'utf8').trim().split('\n')).toEqual([
      '-f',
      'bestaudio/best',
      '--extract-audio',
      '--audio-format',
      'wav',
      '--no-playlist',
      '--no-warnings',
      '-o',
      path.join(dir, 'Song_temp.%(ext)s'),
      '--ffmpeg-location',
      '/opt/ffmpeg',
      'https://example.test/v',
    ])
  })

  it('reports availability from --version', async () => {
    const ok = new YtDlpAcquirer({ binary: fakeBinary(`echo 2024.08.06`) })
    expect(await ok.check()).toEqual({ name: 'yt-dlp', available: true, version: '2024.08.06' })
    const missing = new YtDlpAcquirer({ binary: path.join(makeTempDir(), 'absent') })
    expect((await missing.check()).available).toBe(false)
  })
})
