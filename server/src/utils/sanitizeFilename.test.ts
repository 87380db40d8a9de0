import { describe, it, expect } from 'vitest'
import { sanitizeTitle, profileSlug } from './sanitizeFilename'

describe('sanitizeTitle', () => {
  it('keeps letters, digits, spaces, hyphens and underscores', () => {
    expect(sanitizeTitle('Test Song - Live_2024')).toBe('Test Song - Live_2024')
  })

  it('drops punctuation and trims', () => {
    expect(sanitizeTitle('  Hello, World! (Official Video)  ')).toBe('Hello World Official Video')
  })

  it('turns path separators into underscores', () => {
    expect(sanitizeTitle('AC/DC \\ Back')).toBe('AC_DC _ Back')
    expect(sanitizeTitle('../../etc/passwd')).toBe('___etc_passwd')
  })

  it('keeps non-latin letters', () => {
    expect(sanitizeTitle('Café Señor ロック')).toBe('Café Señor ロック')
  })

  it('falls back to "audio" for missing or empty titles', () => {
    expect(sanitizeTitle(undefined)).toBe('audio')
    expect(sanitizeTitle('?!*')).toBe('audio')
    expect(sanitizeTitle('   ')).toBe('audio')
  })
})

describe('profileSlug', () => {
  it('lowercases and joins words with underscores', () => {
    expect(profileSlug('MP3 320kbps')).toBe('mp3_320kbps')
    expect(profileSlug('FLAC (Lossless)')).toBe('flac_lossless')
  })
})
