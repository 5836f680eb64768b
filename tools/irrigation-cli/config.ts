/**
 * CLI configuration
 * Reads the server URL and token from the environment / .env
 */

import * as path from 'path'

import * as dotenv from 'dotenv'

dotenv.config({
  path: path.resolve(__dirname, '../../.env'),
})

export interface CliConfig {
  baseUrl: string
  token: string
  timeoutMs: number
}

/**
 * Build the CLI configuration
 * @param env - Environment (defaults to process.env)
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const timeout = parseInt(env.IRRIGATION_TIMEOUT_MS || '10000', 10)

  return {
    baseUrl: (env.IRRIGATION_URL || 'http://localhost:8080').replace(/\/+$/, ''),
    token: env.API_TOKEN || '',
    timeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : 10000,
  }
}
