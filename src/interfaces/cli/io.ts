export type IO = {
  stdout: (text: string) => void
  stderr: (text: string) => void
  /** Ask a question on the terminal and resolve with the raw answer line. */
  prompt: (question: string) => Promise<string>
}
