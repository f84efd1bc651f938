// ============================================================================
// monotable CLI — argument parsing
// ============================================================================

import type { Alignment, HorizontalRule, VerticalRule } from '../ascii/types.ts'
import { BORDER_STYLES, isBorderStyleName } from '../config.ts'
import type { BorderStyleName } from '../config.ts'

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export interface CliArgs {
  file?: string
  output?: string
  delimiter: string
  /** First input record holds the column labels */
  headerRow: boolean
  /** Display the header line; undefined means "follow headerRow" */
  showHeader?: boolean
  border: boolean
  horizontalRules?: HorizontalRule
  verticalRules?: VerticalRule
  padding?: number
  align?: Alignment
  columnAlign: Array<{ column: string; align: Alignment }>
  sortColumn?: string
  descending: boolean
  numeric: boolean
  style?: BorderStyleName
  widths: boolean
  help: boolean
  version: boolean
}

const HORIZONTAL_RULES: readonly HorizontalRule[] = ['none', 'frame', 'header', 'all']
const VERTICAL_RULES: readonly VerticalRule[] = ['none', 'frame', 'all']
const ALIGNMENTS: readonly Alignment[] = ['left', 'center', 'right']

function oneOf<T extends string>(allowed: readonly T[], value: string, option: string): T {
  const match = allowed.find(candidate => candidate === value)
  if (match === undefined) {
    throw new CliUsageError(`${option} must be one of ${allowed.join(', ')}, got "${value}"`)
  }
  return match
}

function parseDelimiterValue(value: string): string {
  if (value === '\\t' || value === 'tab') return '\t'
  if (value.length !== 1) {
    throw new CliUsageError(`--delimiter must be a single character, got "${value}"`)
  }
  return value
}

function parseAlignColumn(value: string): { column: string; align: Alignment } {
  const eq = value.lastIndexOf('=')
  if (eq <= 0) {
    throw new CliUsageError(`--align-column expects <label>=<left|center|right>, got "${value}"`)
  }
  return {
    column: value.slice(0, eq),
    align: oneOf(ALIGNMENTS, value.slice(eq + 1), '--align-column'),
  }
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    delimiter: ',',
    headerRow: true,
    border: true,
    columnAlign: [],
    descending: false,
    numeric: false,
    widths: false,
    help: false,
    version: false,
  }

  let i = 0
  const value = (option: string): string => {
    const next = argv[++i]
    if (next === undefined) {
      throw new CliUsageError(`${option} requires a value`)
    }
    return next
  }

  while (i < argv.length) {
    const arg = argv[i] ?? ''

    switch (arg) {
      case '-h':
      case '--help':
        args.help = true
        break

      case '-v':
      case '--version':
        args.version = true
        break

      case '-o':
      case '--output':
        args.output = value(arg)
        break

      case '-d':
      case '--delimiter':
        args.delimiter = parseDelimiterValue(value(arg))
        break

      case '--tsv':
        args.delimiter = '\t'
        break

      case '--no-header-row':
        args.headerRow = false
        break

      case '--show-header':
        args.showHeader = true
        break

      case '--no-header':
        args.showHeader = false
        break

      case '--no-border':
        args.border = false
        break

      case '--hrules':
        args.horizontalRules = oneOf(HORIZONTAL_RULES, value(arg), arg)
        break

      case '--vrules':
        args.verticalRules = oneOf(VERTICAL_RULES, value(arg), arg)
        break

      case '--padding': {
        const raw = value(arg)
        const padding = Number(raw)
        if (!/^-?\d+$/.test(raw) || !Number.isSafeInteger(padding)) {
          throw new CliUsageError(`--padding must be an integer, got "${raw}"`)
        }
        args.padding = padding
        break
      }

      case '--align':
        args.align = oneOf(ALIGNMENTS, value(arg), arg)
        break

      case '--align-column':
        args.columnAlign.push(parseAlignColumn(value(arg)))
        break

      case '--sort':
        args.sortColumn = value(arg)
        break

      case '--desc':
        args.descending = true
        break

      case '--numeric':
        args.numeric = true
        break

      case '--style': {
        const style = value(arg)
        if (!isBorderStyleName(style)) {
          throw new CliUsageError(
            `--style must be one of ${Object.keys(BORDER_STYLES).join(', ')}, got "${style}"`
          )
        }
        args.style = style
        break
      }

      case '--widths':
        args.widths = true
        break

      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new CliUsageError(`Unknown option: ${arg}`)
        }
        if (args.file !== undefined) {
          throw new CliUsageError(`Unexpected argument: ${arg}`)
        }
        args.file = arg
        break
    }
    i++
  }

  return args
}
