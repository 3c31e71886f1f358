import { z } from 'zod'
import { DEFAULT_PROFILE_NAME, type BrowserChannel } from '@nlm-auth/core'

export const PROFILE_ENV_VAR = 'NLM_BROWSER_PROFILE'

const seconds = z.coerce.number().positive().finite()

const channelSchema = z.enum(['chrome', 'chromium'])

export const extractOptionsSchema = z.object({
  debug: z.boolean().default(false),
  env: z.boolean().default(true),
  output: z.string().min(1).optional(),
  channel: channelSchema.default('chrome'),
  sessionTimeout: seconds.default(60),
  pollTimeout: seconds.default(30),
  userAgent: z.string().min(1).optional(),
})

export const locateOptionsSchema = z.object({
  channel: channelSchema.default('chrome'),
})

export interface ExtractCliOptions {
  profileName: string
  debug: boolean
  /** Also save the credentials to ~/.nlm/env */
  env: boolean
  output?: string
  channel: BrowserChannel
  sessionTimeoutMs: number
  pollTimeoutMs: number
  userAgent?: string
}

export interface LocateCliOptions {
  profileName: string
  channel: BrowserChannel
}

export class InvalidOptionsError extends Error {
  readonly code = 'INVALID_OPTIONS'

  constructor(message: string) {
    super(message)
    this.name = 'InvalidOptionsError'
  }
}

/**
 * Profile argument, else NLM_BROWSER_PROFILE, else "Default"
 */
export function resolveProfileName(
  argument: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return argument || env[PROFILE_ENV_VAR] || DEFAULT_PROFILE_NAME
}

export function parseExtractOptions(
  profile: string | undefined,
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): ExtractCliOptions {
  const options = parseWith(extractOptionsSchema, raw)
  return {
    profileName: resolveProfileName(profile, env),
    debug: options.debug,
    env: options.env,
    output: options.output,
    channel: options.channel,
    sessionTimeoutMs: options.sessionTimeout * 1000,
    pollTimeoutMs: options.pollTimeout * 1000,
    userAgent: options.userAgent,
  }
}

export function parseLocateOptions(
  profile: string | undefined,
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): LocateCliOptions {
  const options = parseWith(locateOptionsSchema, raw)
  return { profileName: resolveProfileName(profile, env), channel: options.channel }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const errors = parsed.error.errors
      .map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`)
      .join('; ')
    throw new InvalidOptionsError(`Invalid options: ${errors}`)
  }
  return parsed.data
}
