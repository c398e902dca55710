import type { Tone } from './chars'

import { ToneEnum } from './chars'

type Key = BreakKey | LetterKey
interface BreakKey {
  char: string
  kind: 'break'
}
type LetterKey =
  | { char: string; kind: 'consonant' | 'double' | 'mark' | 'vowel'; letter: string }
  | { char: string; kind: 'tone'; letter: string; tone: Tone }

const toneKeys: Readonly<Record<string, Tone>> = {
    f: ToneEnum.ToneGrave,
    j: ToneEnum.ToneDot,
    r: ToneEnum.ToneHook,
    s: ToneEnum.ToneAcute,
    x: ToneEnum.ToneTilde,
    z: ToneEnum.ToneNone
  },
  vowelKeys = 'aeiouy',
  isAsciiLetter = (char: string) => /^[a-z]$/iu.test(char),
  isBreak = (char: string) => !isAsciiLetter(char),
  classifyKey = (char: string): Key => {
    if (!isAsciiLetter(char)) return { char, kind: 'break' }
    const letter = char.toLowerCase(),
      tone = toneKeys[letter]
    if (tone !== undefined) return { char, kind: 'tone', letter, tone }
    if (letter === 'w') return { char, kind: 'mark', letter }
    if (letter === 'd') return { char, kind: 'double', letter }
    return { char, kind: vowelKeys.includes(letter) ? 'vowel' : 'consonant', letter }
  },
  isLetterKey = (key: Key): key is LetterKey => key.kind !== 'break',
  isVowelKey = (key: Key | undefined) => key?.kind === 'vowel'

export { classifyKey, isBreak, isLetterKey, isVowelKey }
export type { BreakKey, Key, LetterKey }
