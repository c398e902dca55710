/* eslint-disable max-statements */
import type { AutocorrectMode, CorrectionResult } from './autocorrect'
import type { LetterKey } from './keys'
import type { AccentStyle } from './phonology'
import type { WordState } from './syllable'

import { createAutocorrect, modeFromCode } from './autocorrect'
import { classifyKey, isLetterKey } from './keys'
import { classifyWord } from './restore'
import { composeWord } from './syllable'

interface EditInstruction {
  deleteCount: number
  insertText: string
}
interface EngineOptions {
  accent: AccentStyle
  autoRestore: boolean
  autocorrect: AutocorrectMode
  enabled: boolean
  maxWordLength: number
}

class UsageError extends TypeError {
  override readonly name = 'UsageError'
}

const defaultEngineOptions: Readonly<EngineOptions> = {
    accent: 'new',
    autoRestore: true,
    autocorrect: 'off',
    enabled: true,
    maxWordLength: 32
  },
  rawPrefix = '\\',
  noEdit: EditInstruction = { deleteCount: 0, insertText: '' },
  /** Smallest edit turning `before` into `after`, counted in code points. */
  diff = (before: string, after: string): EditInstruction => {
    const from = [...before],
      to = [...after]
    let commonPrefix = 0
    while (commonPrefix < from.length && from[commonPrefix] === to[commonPrefix]) commonPrefix += 1
    return { deleteCount: from.length - commonPrefix, insertText: to.slice(commonPrefix).join('') }
  },
  applyEdit = (text: string, { deleteCount, insertText }: EditInstruction) => {
    const chars = [...text]
    return chars.slice(0, Math.max(0, chars.length - deleteCount)).join('') + insertText
  },
  createEngine = (initial: Partial<EngineOptions> = {}) => {
    let options: EngineOptions = { ...defaultEngineOptions, ...initial },
      keys: LetterKey[] = [],
      word: WordState | undefined,
      rawMode = false,
      overflow = false
    const autocorrect = createAutocorrect(options.autocorrect),
      rendering = () => (word ? (rawMode ? word.raw : word.rendered) : ''),
      reset = () => {
        keys = []
        word = undefined
        rawMode = false
        overflow = false
      },
      settle = (state: WordState) => {
        if (rawMode) return state.raw
        const verdict = options.autoRestore ? classifyWord(state) : undefined,
          text = verdict?.action === 'restore' ? state.raw : state.rendered
        return autocorrect.tryCorrect(text)?.corrected ?? text
      },
      finish = (char: string) => {
        overflow = false
        if (!word) {
          rawMode = char === rawPrefix
          return { deleteCount: 0, insertText: char }
        }
        const edit = diff(rendering(), settle(word) + char)
        reset()
        return edit
      },
      onKey = (char: string, boundary = false): EditInstruction => {
        if ([...char].length !== 1) throw new UsageError(`expected a single character, got ${JSON.stringify(char)}`)
        if (!options.enabled) return { deleteCount: 0, insertText: char }
        const key = classifyKey(char)
        if (boundary || !isLetterKey(key)) return finish(char)
        if (overflow) return { deleteCount: 0, insertText: char }
        const before = rendering()
        // a full buffer gives the word back as typed; the rest of it passes through until the next break
        if (keys.length >= options.maxWordLength) {
          const edit = diff(before, `${word?.raw ?? ''}${char}`)
          reset()
          overflow = true
          return edit
        }
        keys = [...keys, key]
        word = composeWord(keys, options)
        return diff(before, rendering())
      },
      cancel = () => {
        if (!word) return noEdit
        const edit = diff(rendering(), word.raw)
        reset()
        return edit
      },
      configure = (next: Partial<EngineOptions>) => {
        options = { ...options, ...next }
        autocorrect.setMode(options.autocorrect)
        if (!options.enabled) reset()
        return { ...options }
      },
      setAutocorrectMode = (code: number) => configure({ autocorrect: modeFromCode(code) }).autocorrect,
      processString = (text: string) => {
        reset()
        let output = ''
        for (const char of text) output = applyEdit(output, onKey(char))
        return output
      }
    return {
      cancel,
      configure,
      current: () => word,
      onKey,
      processString,
      reset,
      setAutocorrectMode,
      tryCorrect: (text: string): CorrectionResult | undefined => autocorrect.tryCorrect(text)
    }
  }

type Engine = ReturnType<typeof createEngine>

export { applyEdit, createEngine, defaultEngineOptions, diff, UsageError }
export type { EditInstruction, Engine, EngineOptions }
