import type { IO } from '../../src/interfaces/cli/io.js'

export function createTestIO(opts: { answers?: string[] } = {}) {
  const out: string[] = []
  const err: string[] = []
  const questions: string[] = []
  const answers = [...(opts.answers ?? [])]
  const io: IO = {
    stdout: (t) => out.push(t),
    stderr: (t) => err.push(t),
    prompt: async (question) => {
      questions.push(question)
      return answers.shift() ?? ''
    },
  }
  return { io, out, err, questions }
}
