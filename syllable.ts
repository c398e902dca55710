// oxlint-disable no-unreadable-array-destructuring
/* eslint-disable complexity, max-statements */
/** biome-ignore-all lint/nursery/useMaxParams: x */
import type { LetterModification, Tone } from './chars'
import type { LetterKey } from './keys'
import type { AccentStyle, Syllable } from './phonology'

import { addModificationChar, addToneToChar, ToneEnum } from './chars'
import { decompose, isPlausible, parseSyllable, toneAnchor } from './phonology'

type Effect = 'insert' | 'letter' | 'literal' | 'mark' | 'tone' | 'undo'
type ToneKey = Extract<LetterKey, { kind: 'tone' }>
interface ComposeOptions {
  accent: AccentStyle
  maxWordLength: number
}
interface Draft {
  final: string
  initial: string
  letterModifications: [number, LetterModification][]
  tone: Tone
  vowel: string
}
interface Step {
  effect: Effect
  key: LetterKey
}
interface Transition {
  draft: Draft
  effect: Effect
}
/** Everything known about the word in flight, recomputed from its raw keys. */
interface WordState {
  keys: readonly LetterKey[]
  raw: string
  rendered: string
  steps: readonly Step[]
  syllable: Syllable | undefined
}

const defaultComposeOptions: ComposeOptions = { accent: 'new', maxWordLength: 32 },
  maxSyllableLength = 7,
  vowelFamilies: readonly LetterModification[] = ['breve', 'circumflex', 'horn'],
  emptyDraft = (): Draft => ({ final: '', initial: '', letterModifications: [], tone: ToneEnum.ToneNone, vowel: '' }),
  letters = (draft: Draft) => `${draft.initial}${draft.vowel}${draft.final}`,
  tooLong = (draft: Draft) => letters(draft).length > maxSyllableLength,
  positionsOf = (draft: Draft, modification: LetterModification) =>
    new Set(draft.letterModifications.filter(([, mod]) => mod === modification).map(([position]) => position)),
  without = (draft: Draft, drop: (position: number, modification: LetterModification) => boolean): Draft => ({
    ...draft,
    letterModifications: draft.letterModifications.filter(([position, mod]) => !drop(position, mod))
  }),
  inVowel = (draft: Draft, position: number) =>
    position >= draft.initial.length && position < draft.initial.length + draft.vowel.length,
  hornTargets = (draft: Draft) => {
    const start = draft.initial.length,
      vowel = draft.vowel.toLowerCase()
    if (vowel.includes('oa')) return []
    if (vowel === 'uo' && draft.initial && !draft.final) return [start + 1]
    if (vowel === 'uo' || vowel === 'uoi' || vowel === 'uou') return [start, start + 1]
    const u = vowel.indexOf('u')
    if (u !== -1) return [start + u]
    const o = vowel.indexOf('o')
    return o === -1 ? [] : [start + o]
  },
  breveTargets = (draft: Draft) => {
    const vowel = draft.vowel.toLowerCase()
    return vowel === 'a' || vowel === 'oa' ? [draft.initial.length + vowel.length - 1] : []
  },
  // a horn typed on the o of an open uo spreads to the u once the syllable closes
  settleHorn = (draft: Draft): Draft => {
    const vowel = draft.vowel.toLowerCase(),
      start = draft.initial.length,
      horned = positionsOf(draft, 'horn')
    if (!(vowel === 'uo' || vowel === 'uoi' || vowel === 'uou')) return draft
    if (!(draft.final || vowel.length === 3) || horned.has(start) === horned.has(start + 1)) return draft
    const settled = without(draft, (position, mod) => (position === start || position === start + 1) && mod !== 'dyet')
    settled.letterModifications.push([start, 'horn'], [start + 1, 'horn'])
    return settled
  },
  push = (draft: Draft, char: string): Draft => {
    const { final, initial, vowel } = parseSyllable(letters(draft) + char)
    return settleHorn({ ...draft, final, initial, vowel })
  },
  literal = (draft: Draft, key: LetterKey): Transition => ({ draft: push(draft, key.char), effect: 'literal' }),
  attempt = (draft: Draft, next: Draft, effect: Effect, key: LetterKey): Transition =>
    isPlausible(next) ? { draft: next, effect } : literal(draft, key),
  applyTone = (draft: Draft, key: ToneKey): Transition => {
    if (!draft.vowel || tooLong(draft)) return literal(draft, key)
    if (draft.tone === key.tone)
      return { draft: push({ ...draft, tone: ToneEnum.ToneNone }, key.char), effect: key.tone ? 'undo' : 'literal' }
    return attempt(draft, { ...draft, tone: key.tone }, 'tone', key)
  },
  applyCircumflex = (draft: Draft, key: LetterKey): Transition => {
    const index = draft.vowel.toLowerCase().lastIndexOf(key.letter)
    if (index === -1 || tooLong(draft)) return { draft: push(draft, key.char), effect: 'letter' }
    const position = draft.initial.length + index
    if (positionsOf(draft, 'circumflex').has(position))
      return {
        draft: push(
          without(draft, (at, mod) => at === position && mod === 'circumflex'),
          key.char
        ),
        effect: 'undo'
      }
    const next = without(draft, (at, mod) => inVowel(draft, at) && vowelFamilies.includes(mod))
    next.letterModifications.push([position, 'circumflex'])
    return isPlausible(next) ? { draft: next, effect: 'mark' } : { draft: push(draft, key.char), effect: 'letter' }
  },
  applyMark = (draft: Draft, key: LetterKey, previous: Step | undefined): Transition => {
    if (previous?.effect === 'insert') {
      const text = letters(draft),
        { final, initial, vowel } = parseSyllable(text.slice(0, -1) + key.char)
      return { draft: { ...without(draft, at => at === text.length - 1), final, initial, vowel }, effect: 'undo' }
    }
    if (tooLong(draft)) return literal(draft, key)
    const horn = hornTargets(draft),
      modification: LetterModification = horn.length ? 'horn' : 'breve',
      targets = horn.length ? horn : breveTargets(draft)
    if (targets.length) {
      const marked = positionsOf(draft, modification)
      if (targets.every(position => marked.has(position)))
        return { draft: push(without(draft, (_, mod) => mod === modification), key.char), effect: 'undo' }
      const next = without(
        draft,
        (at, mod) => inVowel(draft, at) && mod !== modification && vowelFamilies.includes(mod)
      )
      for (const position of targets) if (!marked.has(position)) next.letterModifications.push([position, modification])
      return attempt(draft, next, 'mark', key)
    }
    if (!draft.vowel && !/^qu?$/iu.test(draft.initial)) {
      const inserted = push(draft, key.char === 'W' ? 'U' : 'u')
      inserted.letterModifications = [...inserted.letterModifications, [letters(draft).length, 'horn']]
      return attempt(draft, inserted, 'insert', key)
    }
    return literal(draft, key)
  },
  applyDouble = (draft: Draft, key: LetterKey, previous: Step | undefined): Transition => {
    const dyet = positionsOf(draft, 'dyet').has(0)
    if (previous?.key.kind === 'double' && previous.effect === 'mark' && dyet)
      return { draft: push(without(draft, (at, mod) => at === 0 && mod === 'dyet'), key.char), effect: 'undo' }
    if (previous?.key.kind === 'double' && previous.effect === 'letter' && !dyet && letters(draft).toLowerCase() === 'd')
      return { draft: { ...draft, letterModifications: [...draft.letterModifications, [0, 'dyet']] }, effect: 'mark' }
    return { draft: push(draft, key.char), effect: 'letter' }
  },
  applyKey = (draft: Draft, key: LetterKey, previous: Step | undefined): Transition => {
    if (key.kind === 'tone') return applyTone(draft, key)
    if (key.kind === 'mark') return applyMark(draft, key, previous)
    if (key.kind === 'double') return applyDouble(draft, key, previous)
    if (key.kind === 'vowel' && 'aeo'.includes(key.letter)) return applyCircumflex(draft, key)
    return { draft: push(draft, key.char), effect: 'letter' }
  },
  formatDraft = (draft: Draft, accent: AccentStyle) => {
    const chars = [...letters(draft)]
    for (const [position, modification] of draft.letterModifications) {
      const char = chars[position]
      if (char) chars[position] = addModificationChar(char, modification)
    }
    if (draft.tone) {
      const { final, initial, vowel } = parseSyllable(chars.join('')),
        position = initial.length + toneAnchor(vowel, final, accent),
        char = chars[position]
      if (char) chars[position] = addToneToChar(char, draft.tone)
    }
    return chars.join('')
  },
  composeWord = (keys: readonly LetterKey[], options: Partial<ComposeOptions> = {}): WordState => {
    const { accent, maxWordLength } = { ...defaultComposeOptions, ...options },
      steps: Step[] = []
    let draft = emptyDraft()
    for (const [index, key] of keys.entries()) {
      const transition = index < maxWordLength ? applyKey(draft, key, steps.at(-1)) : literal(draft, key)
      draft = transition.draft
      steps.push({ effect: transition.effect, key })
    }
    const rendered = formatDraft(draft, accent)
    return { keys, raw: keys.map(key => key.char).join(''), rendered, steps, syllable: decompose(rendered) }
  }

export { composeWord }
export type { ComposeOptions, Effect, Step, WordState }
