/* eslint-disable no-console, no-await-in-loop */
import { clipboard, Key, keyboard } from '@nut-tree-fork/nut-js'

import type { Typer } from './protocol'

const wait = async (ms: number) =>
    new Promise<void>(resolve => {
      setTimeout(resolve, ms)
    }),
  isMac = process.platform === 'darwin',
  pasteKey = isMac ? Key.LeftCmd : Key.LeftControl,
  restoreClipboard = async (previous: string) => {
    try {
      await clipboard.setContent(previous)
    } catch (error) {
      console.warn(`[kieu] could not restore clipboard: ${String(error)}`)
    }
  },
  pasteText = async (text: string) => {
    const previous = await clipboard.getContent().catch((error: unknown) => {
      console.warn(`[kieu] could not read clipboard: ${String(error)}`)
      return null
    })
    try {
      await clipboard.setContent(text)
      await keyboard.pressKey(pasteKey, Key.V)
      await keyboard.releaseKey(pasteKey, Key.V)
      await wait(50)
    } finally {
      if (previous !== null) await restoreClipboard(previous)
    }
  },
  createTyper = (): Typer => {
    keyboard.config.autoDelayMs = 0
    return {
      apply: async (deleteCount, insertText, usePaste) => {
        for (let i = 0; i < deleteCount; i += 1) {
          await keyboard.pressKey(Key.Backspace)
          await keyboard.releaseKey(Key.Backspace)
        }
        if (insertText) await (usePaste ? pasteText(insertText) : keyboard.type(insertText))
      }
    }
  }

export { createTyper }
