import { randomUUID } from 'node:crypto'
import { Hono } from 'hono'
import { streamSSE } from 'hono/streaming'
import type { AppContext } from '../../../core/types.js'
import type { Subscriber } from '../../../extension/newswire/index.js'

export interface NewsRoutesOpts {
  /** Keep-alive ping interval for SSE streams */
  pingMs?: number
}

/** News routes: GET /history, GET /status, GET /stream (SSE: history replay, then live) */
export function createNewsRoutes(ctx: AppContext, opts?: NewsRoutesOpts) {
  const app = new Hono()
  const pingMs = opts?.pingMs ?? 30_000

  app.get('/history', (c) => {
    return c.json({ events: ctx.newswire.history.snapshot() })
  })

  app.get('/status', (c) => {
    return c.json(ctx.newswire.status())
  })

  app.get('/stream', (c) => {
    return streamSSE(c, async (stream) => {
      const { registry } = ctx.newswire
      const id = randomUUID()

      let open = true
      let release = (): void => undefined
      const closed = new Promise<void>((resolve) => { release = () => resolve() })

      const subscriber: Subscriber = {
        id,
        send: async (event) => {
          // writeSSE does not reject on a dead connection; the abort flag is the signal.
          if (!open) throw new Error('stream closed')
          await stream.writeSSE({ data: JSON.stringify(event) })
        },
        close: () => {
          open = false
          release()
        },
      }

      const pingInterval = setInterval(() => {
        stream.writeSSE({ event: 'ping', data: '' }).catch((err) => {
          console.warn(`web: ping to ${id} failed: ${err instanceof Error ? err.message : err}`)
        })
      }, pingMs)

      stream.onAbort(() => {
        open = false
        clearInterval(pingInterval)
        registry.leave(id)
        release()
      })

      const joined = await registry.join(subscriber)
      if (joined) await closed
      clearInterval(pingInterval)
    })
  })

  return app
}
