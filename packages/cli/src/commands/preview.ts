/**
 * Preview Command
 *
 * Prints the schema and the first elements of a file-based pipeline.
 */

import { defineCommand } from 'citty'
import { run } from 'effection'
import { setupLogger } from '@feedline/core'
import { parsePreviewArgs, preview } from '../lib/pipeline.ts'

export const previewCommand = defineCommand({
  meta: {
    name: 'preview',
    description: 'Print the schema and first elements of a pipeline over matching files',
  },
  args: {
    pattern: {
      type: 'positional',
      description: 'Glob pattern of the input files',
      required: true,
    },
    format: {
      type: 'string',
      description: 'How to read each file: lines or records',
      default: 'lines',
      alias: 'f',
    },
    recordBytes: {
      type: 'string',
      description: 'Record size in bytes (required with --format records)',
    },
    headerBytes: {
      type: 'string',
      description: 'Bytes to skip at the start of each file',
    },
    footerBytes: {
      type: 'string',
      description: 'Bytes to ignore at the end of each file',
    },
    compression: {
      type: 'string',
      description: 'GZIP or ZLIB for compressed text files',
    },
    shard: {
      type: 'string',
      description: 'Read only one shard of the files, as <numShards>:<index>',
    },
    skip: {
      type: 'string',
      description: 'Elements to skip',
    },
    shuffle: {
      type: 'string',
      description: 'Shuffle buffer size',
    },
    seed: {
      type: 'string',
      description: 'Shuffle seed',
    },
    take: {
      type: 'string',
      description: 'Elements to print',
      default: '10',
      alias: 'n',
    },
    batch: {
      type: 'string',
      description: 'Batch size',
    },
    prefetch: {
      type: 'string',
      description: 'Prefetch buffer size',
    },
    verbose: {
      type: 'boolean',
      description: 'Log pipeline activity',
      default: false,
      alias: 'v',
    },
  },
  async run({ args }) {
    try {
      const options = parsePreviewArgs(args)
      await run(function* () {
        if (args.verbose) {
          yield* setupLogger({ level: 'debug' })
        }
        const count = yield* preview(options, (line) => console.log(line))
        if (count === 0) {
          console.log('(no elements)')
        }
      })
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
      process.exit(1)
    }
  },
})
