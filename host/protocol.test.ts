import { PassThrough } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'

import type { HostContext, Typer } from './protocol'

import { createEngine, UsageError } from '../engine'
import { encodeMessage, handleMessage, needsPaste, readMessage } from './protocol'

const streamOf = (...chunks: Uint8Array[]) => {
    const stream = new PassThrough()
    stream.end(Buffer.concat(chunks))
    return stream
  },
  recordingTyper = () => {
    const calls: [number, string, boolean][] = [],
      typer: Typer = {
        apply: async (deleteCount, insertText, usePaste) => {
          calls.push([deleteCount, insertText, usePaste])
          await Promise.resolve()
        }
      }
    return { calls, typer }
  },
  contextWith = (overrides: Partial<HostContext> = {}): HostContext => ({
    autoType: false,
    engine: createEngine(),
    typer: recordingTyper().typer,
    ...overrides
  })

describe('framing', () => {
  it('prefixes the JSON body with its little-endian length', () => {
    const bytes = encodeMessage({ action: 'ping' })
    expect([...bytes.subarray(0, 4)]).toEqual([17, 0, 0, 0])
    expect(new TextDecoder().decode(bytes.subarray(4))).toBe('{"action":"ping"}')
  })
  it('reads messages until the stream ends', async () => {
    const stream = streamOf(encodeMessage({ action: 'ping' }), encodeMessage({ action: 'key', key: 'a' }))
    await expect(readMessage(stream)).resolves.toEqual({ action: 'ping' })
    await expect(readMessage(stream)).resolves.toEqual({ action: 'key', key: 'a' })
    await expect(readMessage(stream)).resolves.toBeNull()
  })
  it('stops on a zero length', async () => {
    await expect(readMessage(streamOf(new Uint8Array(4)))).resolves.toBeNull()
  })
  it('stops on a truncated body', async () => {
    await expect(readMessage(streamOf(new Uint8Array([10, 0, 0, 0, 123])))).resolves.toBeNull()
  })
  it('rejects a body that is not an object', async () => {
    const stream = streamOf(new Uint8Array([3, 0, 0, 0]), new TextEncoder().encode('[1]'))
    await expect(readMessage(stream)).rejects.toThrow(UsageError)
  })
  it('rejects a body that is not JSON and keeps reading after it', async () => {
    const stream = streamOf(
      new Uint8Array([4, 0, 0, 0]),
      new TextEncoder().encode('{key'),
      encodeMessage({ action: 'ping' })
    )
    await expect(readMessage(stream)).rejects.toThrow('message is not valid JSON')
    await expect(readMessage(stream)).resolves.toEqual({ action: 'ping' })
  })
})

describe('needsPaste', () => {
  it('is set only for letters with a tone and a mark', () => {
    expect(needsPaste('ố')).toBe(true)
    expect(needsPaste('ô')).toBe(false)
    expect(needsPaste('')).toBe(false)
  })
})

describe('handleMessage', () => {
  it('answers ping and unknown actions', async () => {
    const context = contextWith()
    await expect(handleMessage({ action: 'ping' }, context)).resolves.toEqual({ status: 'ok' })
    await expect(handleMessage({ action: 'dance' }, context)).resolves.toEqual({ action: 'dance', status: 'unknown' })
  })
  it('answers key messages with the edit', async () => {
    const { calls, typer } = recordingTyper(),
      context = contextWith({ typer })
    for (const key of 'ma') await handleMessage({ action: 'key', key }, context)
    await expect(handleMessage({ action: 'key', key: 's' }, context)).resolves.toEqual({
      deleteCount: 1,
      insertText: 'á',
      status: 'ok',
      usePaste: false
    })
    expect(calls).toEqual([])
  })
  it('types key edits when asked to', async () => {
    const { calls, typer } = recordingTyper(),
      context = contextWith({ autoType: true, typer })
    for (const key of 'dduowc') await handleMessage({ action: 'key', key }, context)
    await expect(handleMessage({ action: 'key', key: 'j' }, context)).resolves.toEqual({
      deleteCount: 2,
      insertText: 'ợc',
      status: 'ok',
      usePaste: true
    })
    expect(calls.at(-1)).toEqual([2, 'ợc', true])
  })
  it('reports a boundary and a cancel', async () => {
    const context = contextWith()
    await handleMessage({ action: 'key', key: 'a' }, context)
    await handleMessage({ action: 'key', key: 'a' }, context)
    await expect(handleMessage({ action: 'cancel' }, context)).resolves.toMatchObject({
      deleteCount: 1,
      insertText: 'aa'
    })
    await handleMessage({ action: 'key', key: 'o' }, context)
    await expect(handleMessage({ action: 'key', key: 'r', boundary: true }, context)).resolves.toMatchObject({
      deleteCount: 0,
      insertText: 'r'
    })
  })
  it('turns misuse into an error response', async () => {
    const context = contextWith()
    await expect(handleMessage({ action: 'key', key: 7 }, context)).resolves.toEqual({
      error: 'invalid "key" in key message',
      status: 'error'
    })
    await expect(handleMessage({ action: 'key', key: 'ab' }, context)).resolves.toEqual({
      error: 'expected a single character, got "ab"',
      status: 'error'
    })
  })
  it('lets other failures through', async () => {
    const context = contextWith({
      engine: {
        ...createEngine(),
        onKey: () => {
          throw new Error('boom')
        }
      }
    })
    await expect(handleMessage({ action: 'key', key: 'a' }, context)).rejects.toThrow('boom')
  })
  it('switches auto-correct and looks words up', async () => {
    const context = contextWith()
    await expect(handleMessage({ action: 'correct', word: 'teh' }, context)).resolves.toEqual({
      correction: null,
      status: 'ok'
    })
    await expect(handleMessage({ action: 'mode', mode: 2 }, context)).resolves.toEqual({
      mode: 'english',
      status: 'ok'
    })
    await expect(handleMessage({ action: 'correct', word: 'teh' }, context)).resolves.toEqual({
      correction: { backspaceCount: 3, corrected: 'the', original: 'teh' },
      status: 'ok'
    })
  })
  it('updates options from a config message', async () => {
    const context = contextWith()
    await expect(handleMessage({ action: 'config', accent: 'old' }, context)).resolves.toMatchObject({
      options: { accent: 'old', autoRestore: true, enabled: true },
      status: 'ok'
    })
    await expect(handleMessage({ action: 'config', accent: 'middle' }, context)).resolves.toMatchObject({
      status: 'error'
    })
  })
  it('types explicit edits and pastes stacked marks', async () => {
    const { calls, typer } = recordingTyper()
    await expect(
      handleMessage({ action: 'type', deleteCount: 1, insertText: 'ố' }, contextWith({ typer }))
    ).resolves.toEqual({ deleteCount: 1, insertText: 'ố', status: 'ok', usePaste: true })
    expect(calls).toEqual([[1, 'ố', true]])
  })
  it('reports a typing failure', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined),
      typer: Typer = {
        apply: async () => {
          await Promise.resolve()
          throw new Error('no display')
        }
      }
    await expect(
      handleMessage({ action: 'type', insertText: 'a' }, contextWith({ typer }))
    ).resolves.toEqual({ deleteCount: 0, insertText: 'a', status: 'error', usePaste: false })
    expect(warn).toHaveBeenCalledWith('[kieu] typing failed: Error: no display')
    warn.mockRestore()
  })
})
