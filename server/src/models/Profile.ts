import { ConfigurationError } from '../utils/errors'

export type QualityTier = 'lossless' | 'high' | 'medium'

export type ContainerExtension = 'flac' | 'wav' | 'mp3' | 'aac' | 'ogg' | 'm4a'

export interface Profile {
  readonly name: string
  readonly containerExtension: ContainerExtension
  readonly qualityTier: QualityTier
  /** ffmpeg bitrate string, e.g. "320k". Absent for lossless tiers. */
  readonly targetBitrate?: string
}

export interface CodecSpec {
  codec: string
  /** Whether the container's codec takes a -b:a argument. */
  usesBitrate: boolean
}

export interface EncoderParams {
  codec: string
  bitrate?: string
}

/** Codec per container. m4a and aac share the native AAC encoder. */
export const CODECS: Readonly<Record<ContainerExtension, CodecSpec>> = {
  flac: { codec: 'flac', usesBitrate: false },
  wav: { codec: 'pcm_s16le', usesBitrate: false },
  mp3: { codec: 'libmp3lame', usesBitrate: true },
  aac: { codec: 'aac', usesBitrate: true },
  ogg: { codec: 'libvorbis', usesBitrate: true },
  m4a: { codec: 'aac', usesBitrate: true },
}

export const TIER_ORDER: readonly QualityTier[] = ['lossless', 'high', 'medium']

export const TIER_LABELS: Readonly<Record<QualityTier, string>> = {
  lossless: 'Lossless',
  high: 'High Quality',
  medium: 'Medium Quality',
}

export type SelectionPreset = 'all' | 'high-quality'

const lossless = (name: string, containerExtension: ContainerExtension): Profile => ({
  name,
  containerExtension,
  qualityTier: 'lossless',
})

const lossy = (
  name: string,
  containerExtension: ContainerExtension,
  qualityTier: Exclude<QualityTier, 'lossless'>,
  targetBitrate: string
): Profile => ({ name, containerExtension, qualityTier, targetBitrate })

const DEFAULT_PROFILES: Profile[] = [
  lossless('FLAC (Lossless)', 'flac'),
  lossless('WAV (Lossless)', 'wav'),
  lossy('MP3 320kbps', 'mp3', 'high', '320k'),
  lossy('MP3 256kbps', 'mp3', 'high', '256k'),
  lossy('MP3 192kbps', 'mp3', 'medium', '192k'),
  lossy('MP3 128kbps', 'mp3', 'medium', '128k'),
  lossy('AAC 256kbps', 'aac', 'high', '256k'),
  lossy('AAC 128kbps', 'aac', 'medium', '128k'),
  lossy('OGG 320kbps', 'ogg', 'high', '320k'),
  lossy('OGG 192kbps', 'ogg', 'medium', '192k'),
  lossy('M4A 256kbps', 'm4a', 'high', '256k'),
  lossy('M4A 128kbps', 'm4a', 'medium', '128k'),
]

/**
 * Read-only catalog of output profiles, keyed by name in insertion order.
 */
export class ProfileRegistry {
  private readonly profiles = new Map<string, Profile>()

  constructor(profiles: readonly Profile[] = DEFAULT_PROFILES) {
    for (const profile of profiles) {
      if (this.profiles.has(profile.name)) {
        throw new ConfigurationError(`Duplicate profile name: ${profile.name}`)
      }
      if ((profile.qualityTier === 'lossless') === (profile.targetBitrate !== undefined)) {
        throw new ConfigurationError(`Profile ${profile.name}: bitrate must be set iff the tier is not lossless`)
      }
      this.profiles.set(profile.name, Object.freeze({ ...profile }))
    }
  }

  lookup(name: string): Profile | undefined {
    return this.profiles.get(name)
  }

  require(name: string): Profile {
    const profile = this.lookup(name)
    if (!profile) throw new ConfigurationError(`Unknown profile: ${name}`)
    return profile
  }

  all(): Profile[] {
    return [...this.profiles.values()]
  }

  byTier(tier: QualityTier): Profile[] {
    return this.all().filter((p) => p.qualityTier === tier)
  }

  preset(preset: SelectionPreset): Profile[] {
    if (preset === 'all') return this.all()
    return this.all().filter((p) => p.qualityTier === 'lossless' || p.qualityTier === 'high')
  }

  /**
   * Resolve a user selection: every name must exist; duplicates collapse to the first occurrence.
   */
  resolveSelection(names: readonly string[]): Profile[] {
    if (names.length === 0) throw new ConfigurationError('Select at least one audio profile')
    const unknown = names.filter((n) => !this.profiles.has(n))
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown profile(s): ${unknown.join(', ')}`)
    }
    return [...new Set(names)].map((n) => this.require(n))
  }

  encoderParams(profile: Profile): EncoderParams {
    const spec = CODECS[profile.containerExtension]
    if (!spec.usesBitrate) return { codec: spec.codec }
    if (!profile.targetBitrate) {
      throw new ConfigurationError(`Profile ${profile.name} needs a target bitrate for ${spec.codec}`)
    }
    return { codec: spec.codec, bitrate: profile.targetBitrate }
  }
}

export const defaultRegistry = new ProfileRegistry()
