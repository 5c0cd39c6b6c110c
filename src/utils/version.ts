import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(resolve(__dirname, '../../package.json'), 'utf8'),
)

/** Package version from package.json */
export const APP_VERSION: string = packageJson.version

/**
 * User-Agent header sent with every TVMaze request
 * Format: "tvmaze-client/0.2.0"
 */
export const USER_AGENT = `tvmaze-client/${APP_VERSION}`
