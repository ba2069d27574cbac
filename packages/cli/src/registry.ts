/**
 * Arbor CLI — Built-in Callback Registry
 *
 * The callbacks a grammar file may name when it is run from the CLI:
 *
 *   echo   prints the collected variables as one JSON line
 *   quit   ends the interactive shell
 */

import type { VarMap } from '@arbor/grammar'
import type { LoaderRegistry } from '@arbor/loader'
import type { CliIO } from './io.js'

/** Returned by the `quit` callback. */
export const QUIT: unique symbol = Symbol('arbor.quit')

export function builtinRegistry(io: CliIO): LoaderRegistry {
  return {
    callbacks: {
      echo: (vars: VarMap) => {
        io.out(JSON.stringify(vars) + '\n')
        return vars
      },
      quit: () => QUIT,
    },
  }
}
