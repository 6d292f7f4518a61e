#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs';
import { Pattern } from '../backtrack/pattern.js';
import { astToDot, astToJSON } from '../backtrack/ast-util.js';
import { MatchTracer } from '../backtrack/tracer.js';
import { parseCsv } from '../formats/csv.js';
import { formatFountain, splitLines } from '../formats/fountain.js';
import { colors, logger, useColors } from '../utils/debug.js';

const EXIT_NO_MATCH = 1;
const EXIT_BAD_PATTERN = 2;

/**
 * Compiles `source`, or reports the syntax error and returns null.
 */
function compile(source: string): Pattern | null {
  const result = Pattern.compile(source);
  if (result.isErr()) {
    console.error(colors.red(result.error.message));
    for (const line of result.error.pointer()) {
      console.error(`  ${line}`);
    }
    process.exitCode = EXIT_BAD_PATTERN;
    return null;
  }
  return result.value;
}

function readInput(file: string | undefined): string {
  // fd 0 is stdin
  return fs.readFileSync(file ?? 0, { encoding: 'utf8' });
}

function writeOutput(out: string | undefined, data: string) {
  if (out) {
    fs.writeFileSync(out, data);
    console.log(`wrote ${out}`);
  } else {
    process.stdout.write(data);
  }
}

const parser = yargs(hideBin(process.argv))
  .scriptName('backtrack')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Print debug logging to stderr',
    default: false,
  })
  .option('color', {
    type: 'boolean',
    description: 'Colorize output',
    default: false,
  })
  .middleware((args) => {
    useColors(args.color);
    if (args.verbose) {
      logger.subscribe((...logArgs) => console.error(...logArgs));
    }
  })
  .command({
    command: 'match <pattern> <text>',
    describe: 'check whether the whole text matches the pattern',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .positional('text', { type: 'string', demandOption: true }),
    handler: (args) => {
      const pattern = compile(args.pattern);
      if (!pattern) {
        return;
      }
      const matched = pattern.match(args.text);
      console.log(matched ? colors.green('true') : colors.red('false'));
      if (!matched) {
        process.exitCode = EXIT_NO_MATCH;
      }
    },
  })
  .command({
    command: 'search <pattern> <text>',
    describe: 'find the first place the pattern matches',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .positional('text', { type: 'string', demandOption: true }),
    handler: (args) => {
      const pattern = compile(args.pattern);
      if (!pattern) {
        return;
      }
      const span = pattern.search(args.text);
      if (!span) {
        console.log('no match');
        process.exitCode = EXIT_NO_MATCH;
        return;
      }
      console.log(`${span.start} ${span.end}`);
    },
  })
  .command({
    command: 'findall <pattern> <text>',
    describe: 'list every non-overlapping match',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .positional('text', { type: 'string', demandOption: true }),
    handler: (args) => {
      const pattern = compile(args.pattern);
      if (!pattern) {
        return;
      }
      for (const { start, end } of pattern.findall(args.text)) {
        console.log(`${start} ${end}\t${args.text.slice(start, end)}`);
      }
    },
  })
  .command({
    command: 'ast <pattern>',
    describe: 'dump the syntax tree of a pattern',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .option('format', {
          choices: ['json', 'dot'] as const,
          default: 'json' as const,
          description: 'JSON tree or Graphviz source',
        })
        .option('out', {
          type: 'string',
          description: 'Write to this file instead of stdout',
        }),
    handler: (args) => {
      const pattern = compile(args.pattern);
      if (!pattern) {
        return;
      }
      const data =
        args.format == 'dot'
          ? astToDot(pattern.root)
          : astToJSON(pattern.root) + '\n';
      writeOutput(args.out, data);
    },
  })
  .command({
    command: 'trace <pattern> <text>',
    describe: 'show every node entry, candidate and exit while matching',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .positional('text', { type: 'string', demandOption: true })
        .option('op', {
          choices: ['match', 'search', 'findall'] as const,
          default: 'match' as const,
        }),
    handler: (args) => {
      const pattern = compile(args.pattern);
      if (!pattern) {
        return;
      }
      const tracer = new MatchTracer();
      let result: unknown;
      switch (args.op) {
        case 'match':
          result = pattern.match(args.text, tracer);
          break;
        case 'search':
          result = pattern.search(args.text, tracer);
          break;
        case 'findall':
          result = pattern.findall(args.text, tracer);
          break;
      }
      console.log(tracer.pretty());
      console.log(colors.bold(`${args.op}: ${JSON.stringify(result)}`));
    },
  })
  .command({
    command: 'csv [file]',
    describe: 'parse CSV (from a file or stdin) and print the records as JSON',
    builder: (yargs) =>
      yargs.positional('file', { type: 'string', describe: 'CSV file' }),
    handler: (args) => {
      const records = parseCsv(readInput(args.file));
      console.log(JSON.stringify(records, null, 2));
    },
  })
  .command({
    command: 'fountain [file]',
    describe: 'format a Fountain screenplay as fixed-width text',
    builder: (yargs) =>
      yargs
        .positional('file', { type: 'string', describe: 'Fountain file' })
        .option('output', {
          alias: 'o',
          type: 'string',
          description: 'Write to this file instead of stdout',
        })
        .option('width', {
          type: 'number',
          default: 80,
          description: 'Page width in characters',
        }),
    handler: (args) => {
      const lines = splitLines(readInput(args.file));
      writeOutput(args.output, formatFountain(lines, args.width) + '\n');
    },
  })
  .demandCommand(1)
  .strict();

parser.parseAsync().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
