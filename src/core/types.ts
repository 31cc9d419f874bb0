import type { Newswire } from '../extension/newswire/index.js'
import type { Config } from './config.js'

export type { Config }

export interface Plugin {
  name: string
  start(ctx: AppContext): Promise<void>
  stop(): Promise<void>
}

export interface AppContext {
  config: Config
  newswire: Newswire
}
