import type { LetterKey } from './keys'
import type { Syllable } from './phonology'
import type { Step, WordState } from './syllable'

import { cleanString } from './chars'
import tables from './data/restore.json'
import { isVowelKey } from './keys'
import { isStopFinal, isValidInitial } from './phonology'

type RestoreReason = 'absorbed-final' | 'invalid-initial' | 'split-nucleus' | 'stray-mark' | 'undecomposable'
type Verdict = { action: 'keep' } | { action: 'restore'; reason: RestoreReason }

const restoreRulesVersion = tables.version,
  splitFamilies: ReadonlySet<string> = new Set(tables.splitFamilies),
  allowList: ReadonlySet<string> = new Set(tables.allowList),
  digraphModifiers = tables.digraphModifiers,
  keep: Verdict = { action: 'keep' },
  restore = (reason: RestoreReason): Verdict => ({ action: 'restore', reason }),
  landedAsLetter = (step: Step | undefined) => step?.effect === 'letter' || step?.effect === 'literal',
  rawInitial = (keys: readonly LetterKey[]) => {
    let initial = ''
    for (const [index, key] of keys.entries()) {
      if (key.kind === 'vowel') break
      if (key.kind === 'mark') {
        if (index === 0 && isVowelKey(keys[1])) initial = key.letter
        break
      }
      initial += key.letter
    }
    initial = initial.replace(/^dd/u, 'đ')
    return initial === 'q' && keys[1]?.letter === 'u' ? 'qu' : initial
  },
  // a circumflex, horn or breve the typist put on the vowel marks the word as Vietnamese
  hasVowelMark = (steps: readonly Step[]) => steps.some(step => step.effect === 'mark' && step.key.kind !== 'double'),
  absorbsFinal = (steps: readonly Step[], syllable: Syllable) =>
    isStopFinal(syllable.final) &&
    !hasVowelMark(steps) &&
    steps.some((step, index) => {
      const next = steps[index + 1]
      return step.effect === 'tone' && next !== undefined && next.key.kind !== 'vowel' && landedAsLetter(next)
    }),
  hasStrayMark = (steps: readonly Step[]) => {
    const [first, second] = steps
    if (first?.key.kind === 'mark' && second && second.key.kind !== 'vowel') return true
    return steps.filter(step => step.key.kind === 'mark').length > 1 && steps.at(-1)?.key.kind === 'mark'
  },
  splitsNucleus = (steps: readonly Step[], syllable: Syllable) => {
    const nucleus = cleanString(syllable.nucleus)
    return steps.some((step, index) => {
      const before = steps[index - 1],
        after = steps[index + 1]
      if (step.effect !== 'tone' || !before || !after) return false
      if (before.key.kind !== 'vowel' || after.key.kind !== 'vowel' || after.effect !== 'letter') return false
      const digraph = before.key.letter + after.key.letter
      return nucleus.includes(digraph) && !splitFamilies.has(digraph)
    })
  },
  matchesDigraphModifier = (keys: readonly LetterKey[], steps: readonly Step[], syllable: Syllable) => {
    const toneKey = [...steps].reverse().find(step => step.effect === 'tone')?.key.letter,
      initial = rawInitial(keys)
    return digraphModifiers.some(
      rule => rule.nucleus === syllable.nucleus && rule.key === toneKey && rule.initials.includes(initial)
    )
  },
  /** Decides at a word boundary whether the Vietnamese rendering stays or the raw keys come back. */
  classifyWord = (word: WordState): Verdict => {
    const { keys, raw, rendered, steps, syllable } = word
    if (rendered === raw || allowList.has(raw.toLowerCase())) return keep
    if (!syllable) return restore('undecomposable')
    if (absorbsFinal(steps, syllable)) return restore('absorbed-final')
    if (!isValidInitial(rawInitial(keys))) return restore('invalid-initial')
    if (hasStrayMark(steps)) return restore('stray-mark')
    if (splitsNucleus(steps, syllable) || matchesDigraphModifier(keys, steps, syllable)) return restore('split-nucleus')
    return keep
  }

export { classifyWord, rawInitial, restoreRulesVersion }
export type { RestoreReason, Verdict }
