/**
 * feedline CLI
 *
 * Usage:
 *   feedline preview "data/*.txt" --shuffle 100 --seed 7 --take 5
 *   feedline preview "data/*.bin" --format records --record-bytes 16 --batch 4
 */

import { defineCommand, runMain } from 'citty'
import { previewCommand } from './commands/preview.ts'

const main = defineCommand({
  meta: {
    name: 'feedline',
    version: '0.1.0',
    description: 'Inspect input pipelines over local files',
  },
  subCommands: {
    preview: previewCommand,
  },
})

runMain(main)
