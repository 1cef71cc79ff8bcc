#!/usr/bin/env node
import { createInterface } from 'node:readline/promises'
import { runCli } from './interfaces/cli/run.js'
import type { IO } from './interfaces/cli/io.js'

const io: IO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  prompt: async (question) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    try {
      return await rl.question(question)
    } finally {
      rl.close()
    }
  },
}

process.exitCode = await runCli({ argv: process.argv.slice(2), env: process.env, io })
