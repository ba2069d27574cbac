/**
 * Where the CLI writes. Commands and the shell never touch process.stdout
 * directly, so tests can capture their output.
 */
export interface CliIO {
  readonly out: (text: string) => void
  readonly err: (text: string) => void
}

export const processIO: CliIO = {
  out: (text) => { process.stdout.write(text) },
  err: (text) => { process.stderr.write(text) },
}

/** An in-memory CliIO. */
export class BufferIO implements CliIO {
  stdout = ''
  stderr = ''

  readonly out = (text: string): void => { this.stdout += text }
  readonly err = (text: string): void => { this.stderr += text }
}
