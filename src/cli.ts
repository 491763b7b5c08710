#!/usr/bin/env node

import process from 'node:process'
import { parseArgs } from 'node:util'
import { runPhotoSort } from './index'

const USAGE = `
Usage:
  photo-sorter -i <inputDir> [-o <outputDir>] [--remove] [--verbose]

Options:
  -i, --input    Directory holding the photos to sort (required)
  -o, --output   Directory receiving the YYYY/MM/DD tree (default: current directory)
  -r, --remove   Delete each photo once its copy is verified
  -v, --verbose  Print debug details
  -h, --help     Show this help message

Example:
  photo-sorter -i ~/DCIM -o ~/Pictures --remove
`

function readArgs() {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        help: { type: 'boolean', short: 'h' },
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        remove: { type: 'boolean', short: 'r' },
        verbose: { type: 'boolean', short: 'v' },
      },
    }).values
  }
  catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`)
    console.log(USAGE)
    process.exit(1)
  }
}

const values = readArgs()

if (values.help) {
  console.log(USAGE)
  process.exit(0)
}

if (!values.input) {
  console.error('❌ Missing --input. Use --help for usage.')
  process.exit(1)
}

runPhotoSort({
  inputDir: values.input,
  outputDir: values.output ?? process.cwd(),
  remove: Boolean(values.remove),
  verbose: Boolean(values.verbose),
}).catch((err) => {
  console.error('❌ Fatal:', err instanceof Error ? err.message : err)
  process.exit(1)
})
