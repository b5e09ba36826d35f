#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { runDemo, EXAMPLE_NAMES } from './main';
import { createLogger } from './logger';
import { Exceptions } from './errors';

const logger = createLogger('cli');

export interface CliOptions {
    readonly only?: string[];
    readonly list: boolean;
    readonly help: boolean;
}

const USAGE = `Usage: reactive-catalogue [options]

Subscribes to the catalogue examples and logs the signals each one emits.

Options:
  --only <names>   Comma-separated example names to run (default: all)
  --list           Print the example names and exit
  -h, --help       Show this help`;

/** Parses the command line; unknown example names are rejected. */
export function parseCliArgs(args: string[]) : CliOptions {
    const { values } = parseArgs({
        args,
        options: {
            only: { type: 'string' },
            list: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
        strict: true,
    });

    let only: string[] | undefined;
    if (values.only !== undefined) {
        only = values.only.split(',').map(n => n.trim()).filter(n => n.length != 0);
        const unknown = only.filter(n => !EXAMPLE_NAMES.includes(n));
        if (unknown.length != 0) {
            throw new Error(`Unknown example(s): ${unknown.join(', ')}`);
        }
    }

    return { only, list: values.list ?? false, help: values.help ?? false };
}

async function main() : Promise<void> {
    const options = parseCliArgs(process.argv.slice(2));
    if (options.help) {
        process.stdout.write(USAGE + '\n');
        return;
    }
    if (options.list) {
        process.stdout.write(EXAMPLE_NAMES.join('\n') + '\n');
        return;
    }
    await runDemo({ logger }, options.only);
}

if (require.main === module) {
    main().catch((ex: unknown) => {
        logger.error({ err: Exceptions.propagate(ex) }, 'demo failed');
        process.exitCode = 1;
    });
}
