#!/usr/bin/env node
/**
 * CLI: convert an HPF recording into a delimited table on stdout
 *
 * Usage: hpf-table [options] <file.hpf>
 *
 * Exit codes: 0 success, 1 decode or I/O failure, 2 usage error
 */
import { writeSync } from "node:fs";
import { HpfError } from "../errors.js";
import type { TableSink } from "../output/table.js";
import { HpfReader } from "../reader.js";
import { parseCliArguments, USAGE, UsageError, type CliArguments } from "./args.js";

/** Writes straight to stdout's descriptor so rows never pile up in memory. */
const stdoutSink: TableSink = {
  write(text: string) {
    writeSync(1, text);
  },
};

export function run(argv: string[]): number {
  let args: CliArguments | null;
  try {
    args = parseCliArguments(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return 2;
    }
    throw err;
  }
  if (!args) {
    console.log(USAGE);
    return 0;
  }

  let reader: HpfReader;
  try {
    reader = HpfReader.open(args.file, args.options);
  } catch (err) {
    if (err instanceof RangeError) {
      console.error(`Error: ${err.message}`);
      return 2;
    }
    console.error(`Error: cannot open ${args.file}:`, err instanceof Error ? err.message : err);
    return 1;
  }

  try {
    const summary = reader.convert(stdoutSink);
    if (args.check) {
      console.error(
        `${args.file}: ok, ${summary.chunks} chunks, ${summary.dataChunks} data chunks, ` +
          `${summary.samples} samples per channel, ${reader.listChannels().length} channels, ` +
          `${summary.indexEntries} index entries`,
      );
    }
    return 0;
  } catch (err) {
    if (err instanceof HpfError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    console.error("Error:", err);
    return 1;
  } finally {
    reader.close();
  }
}

process.exitCode = run(process.argv.slice(2));
