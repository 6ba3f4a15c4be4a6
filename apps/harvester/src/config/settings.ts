/**
 * Harvester settings
 *
 * Layered: schema defaults, then the JSON file (HARVESTER_CONFIG or
 * config/harvester.json), then environment variables. An unreadable or
 * invalid file is ignored with a warning; an invalid environment value
 * throws.
 */

import { existsSync, readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { ILogger } from '@carlistings/logger'
import { ValidationError, toErrorMessage } from '../errors.js'
import { loggers } from './logger.js'

export const DEFAULT_SETTINGS_FILE = fileURLToPath(new URL('../../config/harvester.json', import.meta.url))

const databaseSchema = z.object({
  url: z.string().min(1).optional(),
  poolMin: z.number().int().min(0).default(1),
  poolMax: z.number().int().positive().default(10),
})

const s3Schema = z.object({
  bucket: z.string().min(1).optional(),
  region: z.string().min(1).default('eu-west-1'),
  publicBaseUrl: z.string().url().optional(),
  uploadEnabled: z.boolean().default(true),
})

const harvestSchema = z
  .object({
    maxPages: z.number().int().positive().default(2),
    maxItems: z.number().int().positive().default(20),
    delayMinMs: z.number().int().min(0).default(2000),
    delayMaxMs: z.number().int().min(0).default(4000),
    userManagement: z.boolean().default(true),
  })
  .refine(value => value.delayMaxMs >= value.delayMinMs, {
    message: 'delayMaxMs must be >= delayMinMs',
    path: ['delayMaxMs'],
  })

const imagesSchema = z.object({
  maxSize: z.number().int().positive().default(1920),
  quality: z.number().int().min(1).max(100).default(85),
  maxPerRecord: z.number().int().min(0).default(5),
})

const redisSchema = z.object({
  url: z.string().min(1).optional(),
  host: z.string().min(1).default('localhost'),
  port: z.number().int().positive().default(6379),
  password: z.string().min(1).optional(),
})

const urlsSchema = z.object({
  baseUrl: z.string().url().default('https://www.olx.pt'),
  carsMain: z.string().url().default('https://www.olx.pt/carros-motos-e-barcos/carros/'),
  brandTemplate: z.string().includes('{brand}').default('https://www.olx.pt/carros-motos-e-barcos/carros/{brand}/'),
})

export const settingsSchema = z.object({
  database: databaseSchema.default({}),
  s3: s3Schema.default({}),
  harvest: harvestSchema.default({}),
  images: imagesSchema.default({}),
  redis: redisSchema.default({}),
  urls: urlsSchema.default({}),
})

export type Settings = z.output<typeof settingsSchema>

type Section = keyof Settings

// env var -> [section, key, coercion]
const ENV_MAPPINGS: ReadonlyArray<[string, Section, string, 'string' | 'int' | 'bool']> = [
  ['DATABASE_URL', 'database', 'url', 'string'],
  ['DB_POOL_MIN', 'database', 'poolMin', 'int'],
  ['DB_POOL_MAX', 'database', 'poolMax', 'int'],
  ['AWS_S3_BUCKET', 's3', 'bucket', 'string'],
  ['AWS_REGION', 's3', 'region', 'string'],
  ['S3_PUBLIC_BASE_URL', 's3', 'publicBaseUrl', 'string'],
  ['S3_UPLOAD_ENABLED', 's3', 'uploadEnabled', 'bool'],
  ['MAX_PAGES', 'harvest', 'maxPages', 'int'],
  ['MAX_ITEMS', 'harvest', 'maxItems', 'int'],
  ['DELAY_MIN_MS', 'harvest', 'delayMinMs', 'int'],
  ['DELAY_MAX_MS', 'harvest', 'delayMaxMs', 'int'],
  ['USER_MANAGEMENT', 'harvest', 'userManagement', 'bool'],
  ['IMAGE_MAX_SIZE', 'images', 'maxSize', 'int'],
  ['IMAGE_QUALITY', 'images', 'quality', 'int'],
  ['MAX_IMAGES_PER_RECORD', 'images', 'maxPerRecord', 'int'],
  ['REDIS_URL', 'redis', 'url', 'string'],
  ['REDIS_HOST', 'redis', 'host', 'string'],
  ['REDIS_PORT', 'redis', 'port', 'int'],
  ['REDIS_PASSWORD', 'redis', 'password', 'string'],
]

/**
 * Coerce an env string. Values that do not coerce are passed through so
 * schema validation reports them.
 */
export function coerceEnvValue(value: string, kind: 'string' | 'int' | 'bool'): unknown {
  const trimmed = value.trim()
  if (kind === 'int') {
    return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : trimmed
  }
  if (kind === 'bool') {
    const lowered = trimmed.toLowerCase()
    if (['true', '1', 'yes'].includes(lowered)) return true
    if (['false', '0', 'no'].includes(lowered)) return false
    return trimmed
  }
  return trimmed
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readSettingsFile(path: string, log: ILogger): Record<string, unknown> {
  if (!existsSync(path)) {
    log.debug('Settings file not found, using defaults', { path })
    return {}
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    log.warn('Settings file unreadable, using defaults', { path, error: toErrorMessage(error) })
    return {}
  }

  const validated = settingsSchema.safeParse(parsed)
  if (!validated.success) {
    log.warn('Settings file invalid, using defaults', {
      path,
      issues: validated.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    })
    return {}
  }
  return isRecord(parsed) ? parsed : {}
}

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
  const overrides: Record<string, Record<string, unknown>> = {}
  for (const [name, section, key, kind] of ENV_MAPPINGS) {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') continue
    overrides[section] = { ...overrides[section], [key]: coerceEnvValue(raw, kind) }
  }
  return overrides
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  file: string = env.HARVESTER_CONFIG || DEFAULT_SETTINGS_FILE,
  log: ILogger = loggers.config
): Settings {
  const fromFile = readSettingsFile(file, log)
  const fromEnv = envOverrides(env)

  const merged: Record<string, unknown> = {}
  for (const section of Object.keys(settingsSchema.shape)) {
    const fileSection = fromFile[section]
    merged[section] = {
      ...(isRecord(fileSection) ? fileSection : {}),
      ...fromEnv[section],
    }
  }

  const result = settingsSchema.safeParse(merged)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.')
    throw new ValidationError(`Invalid setting ${field}: ${issue?.message ?? 'invalid'}`, field, { stage: 'input' })
  }

  log.debug('Settings loaded', {
    file,
    envOverrides: Object.values(fromEnv).reduce((count, section) => count + Object.keys(section).length, 0),
  })
  return result.data
}
