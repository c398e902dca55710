/* eslint-disable no-console, max-statements */
import type { Readable, Writable } from 'node:stream'

import type { EditInstruction, Engine, EngineOptions } from '../engine'

import { hasStackedMarks } from '../chars'
import { UsageError } from '../engine'

type HostMessage = Record<string, unknown>
interface HostResponse {
  [field: string]: unknown
  status: 'error' | 'fatal' | 'ok' | 'ready' | 'unknown'
}
interface Typer {
  apply: (deleteCount: number, insertText: string, usePaste: boolean) => Promise<void>
}
interface HostContext {
  /** Apply key and cancel edits through the typer as well as answering them. */
  autoType: boolean
  engine: Engine
  typer: Typer
}

const headerSize = 4,
  isRecord = (value: unknown): value is HostMessage =>
    typeof value === 'object' && value !== null && !Array.isArray(value),
  toBytes = (data: unknown): Buffer | null => {
    if (Buffer.isBuffer(data)) return data
    return typeof data === 'string' ? Buffer.from(data) : null
  },
  readChunk = async (stream: Readable, size: number) =>
    new Promise<Buffer | null>(resolve => {
      const take = () => toBytes(stream.read(size)),
        first = take()
      if (first) {
        resolve(first)
        return
      }
      if (stream.readableEnded) {
        resolve(null)
        return
      }
      const cleanup = () => {
          stream.off('readable', onReadable)
          stream.off('end', onEnd)
        },
        onReadable = () => {
          const data = take()
          if (!data) return
          cleanup()
          resolve(data)
        },
        onEnd = () => {
          cleanup()
          resolve(null)
        }
      stream.on('readable', onReadable)
      stream.once('end', onEnd)
    }),
  readExact = async (stream: Readable, size: number): Promise<Buffer | null> => {
    const chunks: Buffer[] = []
    let totalRead = 0
    while (totalRead < size) {
      // eslint-disable-next-line no-await-in-loop
      const chunk = await readChunk(stream, size - totalRead)
      if (!chunk) return null
      chunks.push(chunk)
      totalRead += chunk.length
    }
    return Buffer.concat(chunks, totalRead)
  },
  parseBody = (body: Buffer): unknown => {
    try {
      return JSON.parse(new TextDecoder().decode(body))
    } catch (error) {
      if (error instanceof SyntaxError) throw new UsageError(`message is not valid JSON: ${error.message}`)
      throw error
    }
  },
  /** Reads one length-prefixed JSON message; `null` once the stream ends or a zero length arrives. */
  readMessage = async (stream: Readable): Promise<HostMessage | null> => {
    const header = await readExact(stream, headerSize)
    if (!header) return null
    const messageLength = header.readUInt32LE(0)
    if (messageLength === 0) return null
    const body = await readExact(stream, messageLength)
    if (!body) return null
    const message = parseBody(body)
    if (!isRecord(message)) throw new UsageError('message must be a JSON object')
    return message
  },
  encodeMessage = (message: HostMessage | HostResponse): Uint8Array => {
    const body = new TextEncoder().encode(JSON.stringify(message)),
      result = new Uint8Array(headerSize + body.length)
    new DataView(result.buffer).setUint32(0, body.length, true)
    result.set(body, headerSize)
    return result
  },
  sendMessage = (stream: Writable, message: HostResponse) => {
    stream.write(encodeMessage(message))
  },
  needsPaste = (text: string) => text !== '' && hasStackedMarks(text),
  field = <T>(message: HostMessage, name: string, guard: (value: unknown) => value is T, fallback?: T): T => {
    const value = message[name]
    if (value === undefined && fallback !== undefined) return fallback
    if (!guard(value)) throw new UsageError(`invalid "${name}" in ${String(message.action)} message`)
    return value
  },
  isString = (value: unknown): value is string => typeof value === 'string',
  isBoolean = (value: unknown): value is boolean => typeof value === 'boolean',
  isCount = (value: unknown): value is number => typeof value === 'number' && Number.isInteger(value) && value >= 0,
  isAccent = (value: unknown): value is 'new' | 'old' => value === 'new' || value === 'old',
  typeEdit = async (typer: Typer, { deleteCount, insertText }: EditInstruction, usePaste: boolean) => {
    try {
      await typer.apply(deleteCount, insertText, usePaste)
      return true
    } catch (error) {
      console.warn(`[kieu] typing failed: ${String(error)}`)
      return false
    }
  },
  respondEdit = async (context: HostContext, edit: EditInstruction, typed: boolean): Promise<HostResponse> => {
    const usePaste = needsPaste(edit.insertText),
      ok = !typed || (await typeEdit(context.typer, edit, usePaste))
    return { ...edit, status: ok ? 'ok' : 'error', usePaste }
  },
  dispatch = async (message: HostMessage, context: HostContext): Promise<HostResponse> => {
    const { action } = message,
      { autoType, engine } = context
    if (action === 'ping') return { status: 'ok' }
    if (action === 'key') {
      const key = field(message, 'key', isString),
        boundary = field(message, 'boundary', isBoolean, false)
      return respondEdit(context, engine.onKey(key, boundary), autoType)
    }
    if (action === 'cancel') return respondEdit(context, engine.cancel(), autoType)
    if (action === 'mode') return { mode: engine.setAutocorrectMode(field(message, 'mode', isCount)), status: 'ok' }
    if (action === 'correct') return { correction: engine.tryCorrect(field(message, 'word', isString)) ?? null, status: 'ok' }
    if (action === 'config') {
      const next: Partial<EngineOptions> = {}
      if (message.accent !== undefined) next.accent = field(message, 'accent', isAccent)
      if (message.autoRestore !== undefined) next.autoRestore = field(message, 'autoRestore', isBoolean)
      if (message.enabled !== undefined) next.enabled = field(message, 'enabled', isBoolean)
      return { options: engine.configure(next), status: 'ok' }
    }
    if (action === 'type') {
      const edit = {
          deleteCount: field(message, 'deleteCount', isCount, 0),
          insertText: field(message, 'insertText', isString, '')
        },
        usePaste = field(message, 'usePaste', isBoolean, needsPaste(edit.insertText)),
        ok = await typeEdit(context.typer, edit, usePaste)
      return { ...edit, status: ok ? 'ok' : 'error', usePaste }
    }
    return { action, status: 'unknown' }
  },
  /** Answers one host message; misuse becomes an error response, anything else propagates. */
  handleMessage = async (message: HostMessage, context: HostContext): Promise<HostResponse> => {
    try {
      return await dispatch(message, context)
    } catch (error) {
      if (error instanceof UsageError) return { error: error.message, status: 'error' }
      throw error
    }
  }

export { encodeMessage, handleMessage, needsPaste, readExact, readMessage, sendMessage }
export type { HostContext, HostMessage, HostResponse, Typer }
