import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { FfmpegEncoder, buildOutputOptions, setupStallProtection, resolveFfmpegPath } from './ffmpeg'
import { defaultRegistry } from '../models/Profile'

const fake = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void

  /** Records what the encoder asks of fluent-ffmpeg and lets the test fire its events. */
  class FakeCommand {
    readonly listeners = new Map<string, Listener>()
    options: string[] = []
    savedTo: string | undefined
    killedWith: string | undefined

    constructor(readonly source: string) {}

    outputOptions(options: string[]) {
      this.options = options
      return this
    }

    on(event: string, listener: Listener) {
      this.listeners.set(event, listener)
      return this
    }

    save(destPath: string) {
      this.savedTo = destPath
      return this
    }

    kill(signal: string) {
      this.killedWith = signal
    }

    emit(event: string, ...args: unknown[]) {
      this.listeners.get(event)?.(...args)
    }
  }

  const commands: FakeCommand[] = []
  const ffmpeg = Object.assign(
    (source: string) => {
      const cmd = new FakeCommand(source)
      commands.push(cmd)
      return cmd
    },
    { setFfmpegPath: (_path: string) => undefined }
  )
  return { commands, ffmpeg }
})

vi.mock('fluent-ffmpeg', () => ({ default: fake.ffmpeg }))
vi.mock('@ffmpeg-installer/ffmpeg', () => ({ default: { path: '/opt/installer/ffmpeg' } }))

function lastCommand() {
  const cmd = fake.commands[fake.commands.length - 1]
  if (!cmd) throw new Error('no ffmpeg command was created')
  return cmd
}

describe('buildOutputOptions', () => {
  it('omits the bitrate for lossless codecs', () => {
    expect(buildOutputOptions(defaultRegistry.encoderParams(defaultRegistry.require('FLAC (Lossless)')), 4)).toEqual([
      '-threads',
      '4',
      '-vn',
      '-codec:a',
      'flac',
    ])
    expect(buildOutputOptions(defaultRegistry.encoderParams(defaultRegistry.require('WAV (Lossless)')), 2)).toEqual([
      '-threads',
      '2',
      '-vn',
      '-codec:a',
      'pcm_s16le',
    ])
  })

  it('passes the target bitrate for lossy codecs', () => {
    expect(buildOutputOptions(defaultRegistry.encoderParams(defaultRegistry.require('MP3 320kbps')), 4)).toEqual([
      '-threads',
      '4',
      '-vn',
      '-codec:a',
      'libmp3lame',
      '-b:a',
      '320k',
    ])
  })
})

describe('resolveFfmpegPath', () => {
  it('falls back to the installer binary when the configured path does not exist', () => {
    expect(resolveFfmpegPath('/definitely/not/here/ffmpeg')).toBe('/opt/installer/ffmpeg')
    expect(resolveFfmpegPath(undefined)).toBe('/opt/installer/ffmpeg')
  })
})

describe('setupStallProtection', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('kills the command once the stall window passes', () => {
    const kill = vi.fn()
    const onStall = vi.fn()
    setupStallProtection({ kill }, 1000, onStall)
    vi.advanceTimersByTime(999)
    expect(kill).not.toHaveBeenCalled()
    vi.advanceTimersByTime(1)
    expect(kill).toHaveBeenCalledWith('SIGKILL')
    expect(onStall).toHaveBeenCalledTimes(1)
  })

  it('postpones the kill on every reset', () => {
    const kill = vi.fn()
    const stall = setupStallProtection({ kill }, 1000, () => undefined)
    vi.advanceTimersByTime(600)
    stall.reset()
    vi.advanceTimersByTime(600)
    expect(kill).not.toHaveBeenCalled()
    vi.advanceTimersByTime(400)
    expect(kill).toHaveBeenCalledTimes(1)
  })

  it('does nothing when disabled or cleared', () => {
    const kill = vi.fn()
    setupStallProtection({ kill }, 0, () => undefined)
    const cleared = setupStallProtection({ kill }, 1000, () => undefined)
    cleared.clear()
    vi.advanceTimersByTime(60_000)
    expect(kill).not.toHaveBeenCalled()
  })

  it('still reports the stall when the process is already gone', () => {
    const onStall = vi.fn()
    const kill = vi.fn(() => {
      throw new Error('kill ESRCH')
    })
    setupStallProtection({ kill }, 10, onStall)
    vi.advanceTimersByTime(10)
    expect(onStall).toHaveBeenCalledTimes(1)
  })
})

describe('FfmpegEncoder.encode', () => {
  const mp3 = defaultRegistry.require('MP3 128kbps')

  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function newEncoder(stallMs = 1000) {
    return new FfmpegEncoder({ ffmpegPath: '/usr/bin/ffmpeg', threads: 2, stallMs })
  }

  it('encodes the source to the destination with the profile options', async () => {
    const pending = newEncoder().encode('/work/raw.wav', '/out/Song.mp3', mp3)
    const cmd = lastCommand()
    expect(cmd.source).toBe('/work/raw.wav')
    expect(cmd.savedTo).toBe('/out/Song.mp3')
    expect(cmd.options).toEqual(['-threads', '2', '-vn', '-codec:a', 'libmp3lame', '-b:a', '128k'])
    cmd.emit('end')
    expect(await pending).toEqual({ ok: true, value: undefined })
  })

  it('reports the encoder stderr on error', async () => {
    const pending = newEncoder().encode('/work/raw.wav', '/out/Song.mp3', mp3)
    lastCommand().emit('error', new Error('ffmpeg exited with code 1'), null, '  Unknown encoder libmp3lame \n')
    expect(await pending).toEqual({ ok: false, reason: 'Unknown encoder libmp3lame' })
  })

  it('falls back to the error message when stderr is empty', async () => {
    const pending = newEncoder().encode('/work/raw.wav', '/out/Song.mp3', mp3)
    lastCommand().emit('error', new Error('spawn ffmpeg ENOENT'), null, '')
    expect(await pending).toEqual({ ok: false, reason: 'spawn ffmpeg ENOENT' })
  })

  it('kills a stalled encode and fails that profile', async () => {
    const pending = newEncoder(1000).encode('/work/raw.wav', '/out/Song.mp3', mp3)
    const cmd = lastCommand()
    vi.advanceTimersByTime(800)
    cmd.emit('progress', { percent: 40 })
    vi.advanceTimersByTime(800)
    expect(cmd.killedWith).toBeUndefined()
    vi.advanceTimersByTime(200)
    expect(cmd.killedWith).toBe('SIGKILL')
    expect(await pending).toEqual({ ok: false, reason: 'ENCODER_STALLED: no encoder output for 1000ms' })
  })

  it('ignores events after the outcome is settled', async () => {
    const pending = newEncoder().encode('/work/raw.wav', '/out/Song.mp3', mp3)
    const cmd = lastCommand()
    cmd.emit('end')
    cmd.emit('error', new Error('late'), null, 'late')
    expect(await pending).toEqual({ ok: true, value: undefined })
  })
})
