#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import dotenv from 'dotenv'
import { createProgram } from './program.js'

dotenv.config({ quiet: true })

const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
const version =
  pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0'

await createProgram({ version }).parseAsync()
