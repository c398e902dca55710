import { readFileSync } from 'node:fs'
import { describe, expect, it } from 'vitest'

import { applyCase, correctionTables, createAutocorrect, modeFromCode, modeToCode } from './autocorrect'
import tables from './data/corrections.json'

const sections = ['vietnamese', 'english'] as const

describe('modes', () => {
  it('maps codes to modes and back', () => {
    expect([0, 1, 2, 3].map(modeFromCode)).toEqual(['off', 'vietnamese', 'english', 'all'])
    expect(modeToCode('english')).toBe(2)
  })
  it('treats unknown codes as off', () => {
    expect(modeFromCode(4)).toBe('off')
    expect(modeFromCode(-1)).toBe('off')
  })
})

describe('correctionTables', () => {
  it('merges both tables into all', () => {
    expect(correctionTables.all.size).toBe(correctionTables.vietnamese.size + correctionTables.english.size)
    expect(correctionTables.vietnamese.get('ko')).toBe('không')
  })
  it('holds every key of the data file exactly once', () => {
    const text = readFileSync(new URL('data/corrections.json', import.meta.url), 'utf8'),
      written = text.match(/"[^"]*"\s*:\s*"/gu) ?? []
    expect(written).toHaveLength(Object.keys(tables.vietnamese).length + Object.keys(tables.english).length)
    expect(correctionTables.all.size).toBe(written.length)
  })
  it('never maps a word to itself', () => {
    for (const [typo, fix] of correctionTables.all) expect(fix.toLowerCase()).not.toBe(typo)
  })
})

describe('applyCase', () => {
  it('mirrors all caps and a leading capital', () => {
    expect(applyCase('TEH', 'the')).toBe('THE')
    expect(applyCase('Teh', 'the')).toBe('The')
    expect(applyCase('teh', 'the')).toBe('the')
  })
})

describe('createAutocorrect', () => {
  it('corrects nothing when off', () => {
    const autocorrect = createAutocorrect()
    expect(autocorrect.tryCorrect('teh')).toBeUndefined()
    expect(autocorrect.size()).toBe(0)
  })
  it('only looks in the selected table', () => {
    const autocorrect = createAutocorrect('english')
    expect(autocorrect.tryCorrect('ko')).toBeUndefined()
    expect(autocorrect.tryCorrect('Teh')).toEqual({ backspaceCount: 3, corrected: 'The', original: 'Teh' })
    autocorrect.setMode('vietnamese')
    expect(autocorrect.mode()).toBe('vietnamese')
    expect(autocorrect.tryCorrect('KO')).toEqual({ backspaceCount: 2, corrected: 'KHÔNG', original: 'KO' })
  })
  it('matches Vietnamese typos with tones', () => {
    expect(createAutocorrect('all').tryCorrect('nà')).toEqual({ backspaceCount: 2, corrected: 'là', original: 'nà' })
  })
  it('ignores empty and unknown words', () => {
    const autocorrect = createAutocorrect('all')
    expect(autocorrect.tryCorrect('')).toBeUndefined()
    expect(autocorrect.tryCorrect('kieu')).toBeUndefined()
  })
  it.each(sections)('corrects every %s entry to its stored value', section => {
    const autocorrect = createAutocorrect(section)
    for (const [typo, fix] of correctionTables[section])
      expect(autocorrect.tryCorrect(typo)).toEqual({ backspaceCount: [...typo].length, corrected: fix, original: typo })
  })
  it.each(sections)('finds no %s entry from the other table', section => {
    const other = section === 'english' ? 'vietnamese' : 'english',
      autocorrect = createAutocorrect(other)
    for (const typo of correctionTables[section].keys()) expect(autocorrect.tryCorrect(typo)).toBeUndefined()
  })
  it('reports the size of the active table', () => {
    expect(createAutocorrect('vietnamese').size()).toBe(137)
    expect(createAutocorrect('english').size()).toBe(336)
  })
})
