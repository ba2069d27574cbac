#!/usr/bin/env node
/**
 * bin/arbor.ts — entry point for the `arbor` command.
 *
 * arbor check netctl.yaml
 * arbor run netctl.yaml show interfaces
 * arbor shell netctl.yaml          → interactive shell
 */

import { createProgram } from '../commands/index.js'

await createProgram().parseAsync()
