/**
 * Command-line argument parsing for hpf-table.
 */
import { parseArgs } from "node:util";
import type { HpfReaderOptions } from "../reader.js";

export const USAGE = `Usage: hpf-table [options] <file.hpf>

Options:
  -n, --downsample <N>      keep every Nth sample (default: 1000)
      --no-downsample       keep every sample
  -i, --sample-index        prefix each row with its sample index
  -s, --separator <text>    field separator, "\\t" for tab (default: tab)
      --minimal             only the column header line before the rows
      --check               decode and validate without writing the table
      --max-chunk-size <B>  largest chunk accepted, in bytes (default: 1048576)
  -v, --verbose             diagnostics on stderr, repeat for more
  -h, --help                show this help
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArguments {
  file: string;
  check: boolean;
  options: HpfReaderOptions;
}

function parsePositiveInt(text: string, flag: string): number {
  const value = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(value) || value < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${text}"`);
  }
  return value;
}

function unescapeSeparator(text: string): string {
  return text.replace(/\\t/g, "\t");
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        downsample: { type: "string", short: "n" },
        "no-downsample": { type: "boolean" },
        "sample-index": { type: "boolean", short: "i" },
        separator: { type: "string", short: "s" },
        minimal: { type: "boolean" },
        check: { type: "boolean" },
        "max-chunk-size": { type: "string" },
        verbose: { type: "boolean", short: "v", multiple: true },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse command-line arguments. Returns null when help was requested.
 */
export function parseCliArguments(argv: string[]): CliArguments | null {
  const { values, positionals } = readArgs(argv);
  if (values.help) return null;

  if (positionals.length !== 1) {
    throw new UsageError("Must provide exactly one input file");
  }
  if (values.downsample !== undefined && values["no-downsample"]) {
    throw new UsageError("--downsample and --no-downsample are mutually exclusive");
  }

  const options: HpfReaderOptions = {
    downsample: !values["no-downsample"],
    includeSampleIndex: values["sample-index"] ?? false,
    preamble: !values.minimal,
    table: !values.check,
    verbosity: values.verbose?.length ?? 0,
  };
  if (values.downsample !== undefined) {
    options.downsampleFactor = parsePositiveInt(values.downsample, "--downsample");
  }
  if (values.separator !== undefined) {
    options.separator = unescapeSeparator(values.separator);
  }
  if (values["max-chunk-size"] !== undefined) {
    options.maxChunkSize = parsePositiveInt(values["max-chunk-size"], "--max-chunk-size");
  }

  return { file: positionals[0], check: values.check ?? false, options };
}
