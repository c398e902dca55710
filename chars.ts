/** biome-ignore-all lint/performance/useTopLevelRegex: x */
type LetterModification = 'breve' | 'circumflex' | 'dyet' | 'horn'
type Tone = 0 | 1 | 2 | 3 | 4 | 5

const ToneEnum = { ToneAcute: 2, ToneDot: 5, ToneGrave: 1, ToneHook: 3, ToneNone: 0, ToneTilde: 4 } as const,
  toneMarks: Record<Tone, string> = { 0: '', 1: '\u0300', 2: '\u0301', 3: '\u0309', 4: '\u0303', 5: '\u0323' },
  tones: readonly Tone[] = [1, 2, 3, 4, 5],
  toneRegex = /[\u0300\u0301\u0303\u0309\u0323]/gu,
  modRegex = /[\u0302\u0306\u031B]/gu,
  toneCombining = /[\u0300\u0301\u0303\u0309\u0323]/u,
  markCombining = /[\u0302\u0306\u031B]/u,
  modMarks: Record<Exclude<LetterModification, 'dyet'>, string> = {
    breve: '\u0306',
    circumflex: '\u0302',
    horn: '\u031B'
  },
  baseVowels = 'aeiouy',
  cleanChar = (char: string) => {
    const base = char.normalize('NFD').replaceAll(/[\u0300-\u036F]/gu, '')
    return base === 'đ' ? 'd' : base === 'Đ' ? 'D' : base
  },
  cleanString = (value: string) => value.replaceAll(/./gu, cleanChar),
  cleanVowel = (value: string) => cleanString(value).toLowerCase(),
  isVowel = (char: string) => char !== '' && baseVowels.includes(cleanChar(char).toLowerCase()),
  stripTone = (value: string) => value.normalize('NFD').replaceAll(toneRegex, '').normalize('NFC'),
  findToneFromChar = (char: string): Tone => {
    const nfd = char.normalize('NFD')
    return tones.find(tone => nfd.includes(toneMarks[tone])) ?? ToneEnum.ToneNone
  },
  addToneToChar = (char: string, tone: Tone) => {
    if (!isVowel(char)) return char
    return (stripTone(char).normalize('NFD') + toneMarks[tone]).normalize('NFC')
  },
  addModificationChar = (char: string, modification: LetterModification) => {
    if (modification === 'dyet') return char === 'd' ? 'đ' : char === 'D' ? 'Đ' : char
    const base = stripTone(char).normalize('NFD').replace(modRegex, '')
    return addToneToChar((base + modMarks[modification]).normalize('NFC'), findToneFromChar(char))
  },
  // a letter carrying both a tone and a mark needs two combining marks when typed as keystrokes
  hasStackedMarks = (text: string) => {
    for (const ch of text) {
      const nfd = ch.normalize('NFD')
      if (toneCombining.test(nfd) && markCombining.test(nfd)) return true
    }
    return false
  }

export {
  addModificationChar,
  addToneToChar,
  cleanChar,
  cleanString,
  cleanVowel,
  findToneFromChar,
  hasStackedMarks,
  isVowel,
  stripTone,
  ToneEnum
}
export type { LetterModification, Tone }
