import tables from './data/corrections.json'

type AutocorrectMode = 'all' | 'english' | 'off' | 'vietnamese'
interface CorrectionResult {
  backspaceCount: number
  corrected: string
  original: string
}
interface CorrectionTables {
  all: ReadonlyMap<string, string>
  english: ReadonlyMap<string, string>
  vietnamese: ReadonlyMap<string, string>
}

const modeCodes: readonly AutocorrectMode[] = ['off', 'vietnamese', 'english', 'all'],
  modeFromCode = (code: number): AutocorrectMode => modeCodes[code] ?? 'off',
  modeToCode = (mode: AutocorrectMode) => modeCodes.indexOf(mode),
  toMap = (entries: Record<string, string>): ReadonlyMap<string, string> =>
    new Map(Object.entries(entries).map(([typo, fix]) => [typo.normalize('NFC').toLowerCase(), fix.normalize('NFC')])),
  vietnamese = toMap(tables.vietnamese),
  english = toMap(tables.english),
  correctionTables: CorrectionTables = Object.freeze({
    all: new Map([...vietnamese, ...english]),
    english,
    vietnamese
  }),
  isUpper = (char: string) => char !== char.toLowerCase(),
  isLetter = (char: string) => char.toLowerCase() !== char.toUpperCase(),
  applyCase = (source: string, target: string) => {
    const chars = [...source],
      [first] = chars
    if (chars.some(isLetter) && chars.every(char => !isLetter(char) || isUpper(char))) return target.toUpperCase()
    if (first && isUpper(first)) return target.charAt(0).toUpperCase() + target.slice(1)
    return target
  },
  /** Exact-match typo replacement over the shared tables; one instance per engine. */
  createAutocorrect = (initial: AutocorrectMode = 'off', shared: CorrectionTables = correctionTables) => {
    let mode = initial
    const table = () => (mode === 'off' ? undefined : shared[mode])
    return {
      mode: () => mode,
      setMode: (next: AutocorrectMode) => {
        mode = next
      },
      size: () => table()?.size ?? 0,
      tryCorrect: (word: string): CorrectionResult | undefined => {
        if (!word) return undefined
        const original = word.normalize('NFC'),
          fix = table()?.get(original.toLowerCase())
        if (fix === undefined) return undefined
        return { backspaceCount: [...word].length, corrected: applyCase(original, fix), original: word }
      }
    }
  }

export { applyCase, correctionTables, createAutocorrect, modeFromCode, modeToCode }
export type { AutocorrectMode, CorrectionResult, CorrectionTables }
