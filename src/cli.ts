#!/usr/bin/env node
// src/cli.ts
import fs, { type Stats } from 'fs';
import { fileURLToPath } from 'url';
import { sourceReadFailure } from './errors.js';
import { run } from './interpreter.js';
import { createProcessIo, type Io } from './io.js';

function printUsage(): void {
    console.log(`
Tape Interpreter

Usage: bf-interp [options] <file>

Options:
  --raw-input, -r       Pass newline bytes through to ','
  --max-steps, -s <n>   Abort after <n> commands
  --time, -t            Show execution time
  --help, -h            Show this help
`);
}

export const readSource = (file: string): string => {
    let stat: Stats;
    try {
        stat = fs.statSync(file);
    } catch {
        throw sourceReadFailure(`path does not exist: ${file}`);
    }
    if (!stat.isFile()) {
        throw sourceReadFailure(`target is not a file: ${file}`);
    }
    try {
        return fs.readFileSync(file, 'utf8');
    } catch (err) {
        throw sourceReadFailure(`could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
};

export function main(
    args: string[],
    io: Io = createProcessIo(),
    log: (message: string) => void = console.error
): number {
    let file: string | null = null;
    let showTime = false;
    let skipInputNewlines = true;
    let maxSteps: number | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            printUsage();
            return 0;
        } else if (arg === '--raw-input' || arg === '-r') {
            skipInputNewlines = false;
        } else if (arg === '--max-steps' || arg === '-s') {
            i++;
            const n = Number(args[i]);
            if (!Number.isInteger(n) || n < 0) {
                log('Invalid step limit. Use a non-negative integer');
                return 1;
            }
            maxSteps = n;
        } else if (arg === '--time' || arg === '-t') {
            showTime = true;
        } else if (!arg.startsWith('-')) {
            file = arg;
        }
    }

    if (!file) {
        log('No input file specified');
        printUsage();
        return 1;
    }

    try {
        const source = readSource(file);
        const start = process.hrtime.bigint();

        run(source, { io, skipInputNewlines, maxSteps });

        if (showTime) {
            const end = process.hrtime.bigint();
            const timeMs = Number(end - start) / 1e6;
            log(`\nExecution time: ${timeMs.toFixed(2)}ms`);
        }
        return 0;
    } catch (err) {
        log(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        return 1;
    }
}

const entry = process.argv[1];
if (entry && fs.existsSync(entry) && fs.realpathSync(entry) === fileURLToPath(import.meta.url)) {
    process.exitCode = main(process.argv.slice(2));
}
