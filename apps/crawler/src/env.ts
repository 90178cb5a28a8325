/**
 * Environment loader - import first, before anything reads process.env.
 *
 * Loads apps/crawler/.env.local outside production; production runs take
 * their settings from the process environment directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
