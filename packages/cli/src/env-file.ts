import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { parse } from 'dotenv'
import type { AuthResult } from '@nlm-auth/core'
import { PROFILE_ENV_VAR } from './options.js'

export const ENV_FILE_DIR = '.nlm'
export const ENV_FILE_NAME = 'env'

export function getEnvFilePath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ENV_FILE_DIR, ENV_FILE_NAME)
}

/**
 * Render variables as KEY="value" lines, in insertion order
 */
export function formatEnvFile(variables: Record<string, string>): string {
  return Object.entries(variables)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}\n`)
    .join('')
}

/**
 * Save the credentials to ~/.nlm/env (owner-only), keeping any other
 * variables already in the file. Returns the file path.
 */
export async function saveAuthToEnvFile(
  result: AuthResult,
  profileName: string,
  homeDir: string = os.homedir()
): Promise<string> {
  const envPath = getEnvFilePath(homeDir)
  await mkdir(path.dirname(envPath), { recursive: true, mode: 0o700 })

  const variables = { ...(await readExisting(envPath)) }
  variables.NLM_COOKIES = result.cookies
  variables.NLM_AUTH_TOKEN = result.token
  variables[PROFILE_ENV_VAR] = profileName

  await writeFile(envPath, formatEnvFile(variables), { encoding: 'utf-8', mode: 0o600 })
  await chmod(envPath, 0o600)
  return envPath
}

async function readExisting(envPath: string): Promise<Record<string, string>> {
  try {
    return parse(await readFile(envPath, 'utf-8'))
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }
    throw error
  }
}
