import type { Profile } from '../models/Profile'

/** Tagged result from an external tool. `reason` carries the tool's own diagnostic (usually stderr). */
export type Outcome<T = void> = { ok: true; value: T } | { ok: false; reason: string }

export const succeeded = <T>(value: T): Outcome<T> => ({ ok: true, value })
export const failed = (reason: string): Outcome<never> => ({ ok: false, reason })

export interface SourceMetadata {
  title: string
}

export interface FetchTarget {
  workDir: string
  /** The acquirer writes `${fileStem}.<ext>` inside workDir. */
  fileStem: string
}

/** Source acquisition backend: metadata lookup plus best-audio retrieval. */
export interface Acquirer {
  resolve(locator: string): Promise<Outcome<SourceMetadata>>
  fetch(locator: string, target: FetchTarget): Promise<Outcome>
}

/** Audio encoder backend: one source file to one destination file for one profile. */
export interface Encoder {
  encode(sourcePath: string, destPath: string, profile: Profile): Promise<Outcome>
}

/** Executables the service shells out to, reported by /readyz. */
export interface ToolCheck {
  name: string
  available: boolean
  version?: string
  error?: string
}
