import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { serve } from '@hono/node-server'
import type { Plugin, AppContext } from '../../core/types.js'
import { createNewsRoutes } from './routes/news.js'

export interface WebConfig {
  port: number
  /** SSE keep-alive interval in seconds */
  pingSeconds: number
}

/** Assemble the HTTP app: /api/news/* plus a liveness probe. */
export function createWebApp(ctx: AppContext, config: Pick<WebConfig, 'pingSeconds'>): Hono {
  const app = new Hono()
  app.use('/api/*', cors())

  app.get('/healthz', (c) => c.json({ ok: true }))
  app.route('/api/news', createNewsRoutes(ctx, { pingMs: config.pingSeconds * 1000 }))

  return app
}

export class WebPlugin implements Plugin {
  name = 'web'
  private server: ReturnType<typeof serve> | null = null
  private ctx: AppContext | null = null

  constructor(private config: WebConfig) {}

  async start(ctx: AppContext) {
    this.ctx = ctx
    const app = createWebApp(ctx, this.config)

    this.server = serve({ fetch: app.fetch, port: this.config.port }, (info) => {
      console.log(`web plugin listening on http://localhost:${info.port}`)
    })
  }

  async stop() {
    // Ends every open SSE stream so the server can close.
    await this.ctx?.newswire.registry.closeAll()
    this.server?.close()
    this.server = null
  }
}
