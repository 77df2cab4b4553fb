#!/usr/bin/env node
/**
 * Command line entry: print the metadata of one ASCII STL file
 */

import { readSTL } from '../../shared/parsers/stl';
import { toReport, toText } from '../../shared/converters/report';

const USAGE = 'format: stl-metadata <filename.stl>';

export const runCli = (
  args: readonly string[],
  out: (line: string) => void = console.log,
  err: (line: string) => void = console.error
): number => {
  const [file] = args;
  if (args.length !== 1 || !file.toLowerCase().endsWith('.stl')) {
    err(USAGE);
    return 1;
  }

  const result = readSTL(file);
  if (!result.ok) {
    err(`${file}:${result.error.line}: ${result.error.message}`);
    return 1;
  }

  toText(toReport(result.value)).forEach(line => out(line));
  return 0;
};

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
