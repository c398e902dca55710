// oxlint-disable prefer-await-to-then, prefer-top-level-await
/* eslint-disable no-console, no-await-in-loop, no-continue */
/** biome-ignore-all lint/performance/noAwaitInLoops: x */
import { createEngine, UsageError } from '../engine'
import { handleMessage, readMessage, sendMessage } from './protocol'
import type { HostMessage } from './protocol'
import { createTyper } from './typing'

const args = process.argv.slice(2),
  engine = createEngine({ accent: args.includes('--old-accent') ? 'old' : 'new' }),
  context = { autoType: args.includes('--type'), engine, typer: createTyper() },
  skipped = Symbol('skipped'),
  next = async (): Promise<HostMessage | null | typeof skipped> =>
    readMessage(process.stdin).catch((error: unknown) => {
      if (!(error instanceof UsageError)) throw error
      sendMessage(process.stdout, { error: error.message, status: 'error' })
      return skipped
    }),
  main = async () => {
    console.warn(`[kieu] host ready (autoType: ${String(context.autoType)})`)
    sendMessage(process.stdout, { status: 'ready' })
    while (true) {
      const message = await next()
      if (!message) break
      if (message === skipped) continue
      sendMessage(process.stdout, await handleMessage(message, context))
    }
    console.warn('[kieu] input closed, exiting')
  }
main().catch((error: unknown) => {
  console.warn(`[kieu] fatal: ${String(error)}`)
  sendMessage(process.stdout, { error: String(error), status: 'fatal' })
  process.exit(1)
})
