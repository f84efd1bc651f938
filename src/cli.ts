// ============================================================================
// monotable CLI
//
// Render CSV/TSV as a fixed-width table in the terminal.
//
// Usage:
//   monotable data.csv                    # table from a file
//   cat data.tsv | monotable --tsv        # piped input
//   monotable --sort Age --numeric a.csv  # sorted by a numeric column
// ============================================================================

import { readFile, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { text } from 'node:stream/consumers'
import { BORDER_STYLES } from './config.ts'
import { CliUsageError, parseArgs } from './cli/args.ts'
import type { CliArgs } from './cli/args.ts'
import { buildTable, renderWidthReport } from './cli/build-table.ts'
import { parseDelimited } from './cli/delimited.ts'

const VERSION = '0.1.0'

// ============================================================================
// Help
// ============================================================================

function showHelp(): void {
  console.log(`
monotable - Render delimited text as a fixed-width table

Usage:
  monotable [options] [file]

Arguments:
  file                        Input file path (reads from stdin if omitted or "-")

Input Options:
  -d, --delimiter <char>      Field delimiter (default: ","; "tab" or "\\t" for tab)
  --tsv                       Same as --delimiter tab
  --no-header-row             First record is data; columns are numbered 1..N

Layout Options:
  --no-header                 Hide the header line
  --show-header               Show the header line even with --no-header-row
  --no-border                 Leave horizontal rule lines empty
  --hrules <mode>             none | frame | header | all (default: frame)
  --vrules <mode>             none | frame | all (default: all)
  --padding <n>               Spaces around each cell (default: 1)
  --align <align>             left | center | right (default: left)
  --align-column <label>=<align>
                              Alignment for one column (repeatable)
  --style <name>              Border glyphs: ${Object.keys(BORDER_STYLES).join(', ')}

Sorting:
  --sort <label>              Sort rows by a column
  --desc                      Sort descending
  --numeric                   Compare integer values numerically

Output:
  -o, --output <file>         Write output to file instead of stdout
  --widths                    Print each column's display width instead

Info:
  -h, --help                  Show this help message
  -v, --version               Show version number

Examples:
  monotable users.csv
  monotable --tsv --hrules all --style unicode < report.tsv
  monotable --sort Score --numeric --desc --align-column Score=right scores.csv
`.trim())
}

// ============================================================================
// Input/Output
// ============================================================================

async function readInput(filePath?: string): Promise<string> {
  if (filePath !== undefined && filePath !== '-') {
    if (!existsSync(filePath)) {
      console.error(`Error: File not found: ${filePath}`)
      process.exit(3)
    }
    return await readFile(filePath, 'utf-8')
  }

  // No piped input
  if (process.stdin.isTTY) {
    showHelp()
    process.exit(1)
  }

  return await text(process.stdin)
}

async function writeOutput(outputPath: string | undefined, content: string): Promise<void> {
  const body = content.endsWith('\n') ? content : content + '\n'
  if (outputPath) {
    await writeFile(outputPath, body, 'utf-8')
  } else {
    process.stdout.write(body)
  }
}

// ============================================================================
// Main
// ============================================================================

function parseArgsOrExit(argv: string[]): CliArgs {
  try {
    return parseArgs(argv)
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`)
      console.error('Run "monotable --help" for usage information')
      process.exit(1)
    }
    throw err
  }
}

async function main(): Promise<void> {
  const args = parseArgsOrExit(process.argv.slice(2))

  if (args.help) {
    showHelp()
    process.exit(0)
  }

  if (args.version) {
    console.log(VERSION)
    process.exit(0)
  }

  const input = await readInput(args.file)

  if (!input.trim()) {
    console.error('Error: Empty input')
    process.exit(1)
  }

  try {
    const records = parseDelimited(input, args.delimiter)
    const output = args.widths
      ? renderWidthReport(records, args)
      : buildTable(records, args, message => console.error(`Warning: ${message}`)).render()

    await writeOutput(args.output, output)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    console.error(`Error: ${message}`)
    process.exit(2)
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err)
  console.error(`Error: ${message}`)
  process.exit(2)
})
