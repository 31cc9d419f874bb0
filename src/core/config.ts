import { z } from 'zod'
import { readFile, writeFile, mkdir } from 'fs/promises'
import { resolve } from 'path'
import { newswireSchema } from '../extension/newswire/config.js'

const CONFIG_DIR = resolve('data/config')

// ==================== Individual Schemas ====================

const connectorsSchema = z.object({
  web: z.object({
    port: z.number().int().positive().default(3002),
    /** Interval between SSE keep-alive pings */
    pingSeconds: z.number().int().positive().default(30),
  }).default({ port: 3002, pingSeconds: 30 }),
})

// ==================== Unified Config Type ====================

export type Config = {
  newswire: z.infer<typeof newswireSchema>
  connectors: z.infer<typeof connectorsSchema>
}

export type ConfigSection = keyof Config

const sectionSchemas: { [K in ConfigSection]: z.ZodType<Config[K], z.ZodTypeDef, unknown> } = {
  newswire: newswireSchema,
  connectors: connectorsSchema,
}

const sectionFiles: Record<ConfigSection, string> = {
  newswire: 'newswire.json',
  connectors: 'connectors.json',
}

// ==================== Loader ====================

/** Read a JSON config file. Returns undefined if file does not exist. */
async function loadJsonFile(dir: string, filename: string): Promise<unknown | undefined> {
  try {
    return JSON.parse(await readFile(resolve(dir, filename), 'utf-8'))
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined
    }
    throw err
  }
}

/** Parse with Zod; if the file was missing, seed it to disk with defaults. */
async function parseAndSeed<T>(
  dir: string,
  filename: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown | undefined,
): Promise<T> {
  const parsed = schema.parse(raw ?? {})
  if (raw === undefined) {
    await mkdir(dir, { recursive: true })
    await writeFile(resolve(dir, filename), JSON.stringify(parsed, null, 2) + '\n')
  }
  return parsed
}

/**
 * Load every config section from `dir` (default data/config).
 * Invalid files throw a ZodError; startup treats that as fatal.
 */
export async function loadConfig(dir: string = CONFIG_DIR): Promise<Config> {
  const [newswireRaw, connectorsRaw] = await Promise.all([
    loadJsonFile(dir, sectionFiles.newswire),
    loadJsonFile(dir, sectionFiles.connectors),
  ])

  return {
    newswire: await parseAndSeed(dir, sectionFiles.newswire, sectionSchemas.newswire, newswireRaw),
    connectors: await parseAndSeed(dir, sectionFiles.connectors, sectionSchemas.connectors, connectorsRaw),
  }
}
