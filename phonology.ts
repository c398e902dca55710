import type { Tone } from './chars'

import { cleanChar, cleanString, cleanVowel, findToneFromChar, isVowel, stripTone, ToneEnum } from './chars'
import tables from './data/phonology.json'

type AccentStyle = 'new' | 'old'
interface Syllable {
  final: string
  initial: string
  /** Lowercase marked vowel cluster without its tone, e.g. `ươ`. */
  nucleus: string
  tone: Tone
  /** Index into `nucleus` of the letter that carries the tone. */
  toneIndex: number
}
interface SyllableParts {
  final: string
  initial: string
  vowel: string
}

const phonologyVersion = tables.version,
  initials: ReadonlySet<string> = new Set(tables.initials),
  initialPrefixes: ReadonlySet<string> = new Set(
    tables.initials.flatMap(initial => [...initial].map((_, index) => cleanString(initial.slice(0, index + 1))))
  ),
  frontInitials: ReadonlySet<string> = new Set(tables.frontInitials),
  backInitials: ReadonlySet<string> = new Set(tables.backInitials),
  finals: ReadonlySet<string> = new Set(tables.finals),
  stopFinals: ReadonlySet<string> = new Set(tables.stopFinals),
  palatalFinals: ReadonlySet<string> = new Set(tables.palatalFinals),
  vowelPatterns: ReadonlySet<string> = new Set(tables.vowelPatterns),
  openNuclei: ReadonlySet<string> = new Set(tables.openNuclei),
  closedNuclei: ReadonlySet<string> = new Set(tables.closedNuclei),
  anchorSecond: readonly string[] = tables.anchorSecond,
  parseSyllable = (input: string): SyllableParts => {
    const chars = [...input],
      lowerInput = cleanString(input).toLowerCase(),
      isVowelAt = (index: number) => isVowel(chars[index] ?? '')
    let start = 0
    if (lowerInput.startsWith('gi') && !isVowelAt(2)) start = 1
    else if (lowerInput.startsWith('gi') || lowerInput.startsWith('qu')) start = 2
    else while (start < chars.length && !isVowelAt(start)) start += 1

    let end = start
    while (end < chars.length && isVowelAt(end)) end += 1
    return {
      final: chars.slice(end).join(''),
      initial: chars.slice(0, start).join(''),
      vowel: chars.slice(start, end).join('')
    }
  },
  isValidInitial = (text: string) => text === '' || initials.has(text.toLowerCase()),
  isInitialPrefix = (text: string) => text === '' || initialPrefixes.has(cleanString(text).toLowerCase()),
  isValidFinal = (text: string) => finals.has(text.toLowerCase()),
  isStopFinal = (text: string) => stopFinals.has(text.toLowerCase()),
  toneAnchor = (nucleus: string, final = '', accent: AccentStyle = 'new') => {
    const vowel = stripTone(nucleus).toLowerCase(),
      base = cleanString(vowel)
    if (vowel.length < 2) return 0
    const marked = vowel.search(/[âêơ]/u)
    if (marked !== -1) return marked
    if (accent === 'old') return vowel.length === 3 || final ? 1 : 0
    if (anchorSecond.some(pair => base.includes(pair))) return 1
    return !final && vowel.length === 2 ? 0 : 1
  },
  // lenient check while keys are still arriving: marks are ignored and the initial may be incomplete
  isPlausible = ({ final, initial, vowel }: SyllableParts) => {
    if (!isInitialPrefix(initial)) return false
    if (!vowel) return true
    return vowelPatterns.has(cleanVowel(vowel)) && (!final || isValidFinal(final))
  },
  decompose = (text: string): Syllable | undefined => {
    const word = text.normalize('NFC').toLowerCase()
    if (!/^\p{L}+$/u.test(word)) return undefined
    let tone: Tone = ToneEnum.ToneNone,
      tonePosition = -1
    for (const [index, char] of [...word].entries()) {
      const found = findToneFromChar(char)
      if (!found) continue
      if (tone) return undefined
      tone = found
      tonePosition = index
    }
    const { final, initial, vowel } = parseSyllable(stripTone(word))
    if (!(vowel && isValidInitial(initial))) return undefined
    if (final ? !(finals.has(final) && closedNuclei.has(vowel)) : !openNuclei.has(vowel)) return undefined
    if (palatalFinals.has(final) && !'aêiy'.includes(vowel.slice(-1))) return undefined
    const first = cleanChar(vowel.charAt(0))
    if (frontInitials.has(initial) && !'eiy'.includes(first)) return undefined
    // gi before a consonant parses as g + i, so only e and y are barred here
    if (backInitials.has(initial) && 'ey'.includes(first)) return undefined
    const toneIndex = tone ? tonePosition - initial.length : toneAnchor(vowel, final)
    if (toneIndex < 0 || toneIndex >= vowel.length) return undefined
    return { final, initial, nucleus: vowel, tone, toneIndex }
  }

export {
  decompose,
  isInitialPrefix,
  isPlausible,
  isStopFinal,
  isValidFinal,
  isValidInitial,
  parseSyllable,
  phonologyVersion,
  toneAnchor
}
export type { AccentStyle, Syllable, SyllableParts }
