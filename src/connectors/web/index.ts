export { WebPlugin, createWebApp } from './web-plugin.js'
export type { WebConfig } from './web-plugin.js'
export { createNewsRoutes } from './routes/news.js'
export type { NewsRoutesOpts } from './routes/news.js'
