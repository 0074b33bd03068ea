/**
 * @fileoverview PIN Hashing Tool
 *
 * Converts a member CSV export with plaintext PINs into one carrying
 * salted PIN hashes, ready to be imported back into the Members sheet.
 *
 * @remarks
 * Usage:
 * ```bash
 * npm run hash-pins -- --infile members.csv --outfile members-hashed.csv
 * npm run hash-pins -- --infile members.csv --outfile out.csv --salt "$PIN_SALT"
 * ```
 *
 * The salt defaults to PIN_SALT from the environment and must match the
 * portal's. Nothing is written when any row is invalid.
 */

import { readFile, writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { CsvFormatError, formatCsv, hashPinTable, parseCsv } from '../src/credentials';
import { RowValidationError, TableShapeError } from '../src/shared/tables';

/* -------------------------------------------------------------------------- */
/*                              Exit Codes                                     */
/* -------------------------------------------------------------------------- */

export const EXIT_OK = 0;
export const EXIT_INVALID_INPUT = 1;
export const EXIT_USAGE = 2;

const USAGE = 'Usage: hash-pins --infile <members.csv> --outfile <hashed.csv> [--salt <salt>]';

export interface ConsoleLike {
    log(message: string): void;
    error(message: string): void;
}

/* -------------------------------------------------------------------------- */
/*                              Argument Parsing                               */
/* -------------------------------------------------------------------------- */

interface HashPinsOptions {
    infile: string;
    outfile: string;
    salt: string;
}

type ParsedArgs =
    | { kind: 'run'; options: HashPinsOptions }
    | { kind: 'help' }
    | { kind: 'usage-error'; message: string };

function parseOptions(argv: string[], env: NodeJS.ProcessEnv): ParsedArgs {
    let values: { infile?: string; outfile?: string; salt?: string; help?: boolean };
    try {
        ({ values } = parseArgs({
            args: argv,
            options: {
                infile: { type: 'string' },
                outfile: { type: 'string' },
                salt: { type: 'string' },
                help: { type: 'boolean', short: 'h' },
            },
            strict: true,
            allowPositionals: false,
        }));
    } catch (error) {
        return { kind: 'usage-error', message: error instanceof Error ? error.message : String(error) };
    }

    if (values.help) return { kind: 'help' };
    if (!values.infile) return { kind: 'usage-error', message: 'Missing --infile' };
    if (!values.outfile) return { kind: 'usage-error', message: 'Missing --outfile' };

    return {
        kind: 'run',
        options: {
            infile: values.infile,
            outfile: values.outfile,
            salt: values.salt ?? env.PIN_SALT ?? '',
        },
    };
}

function isInputError(error: unknown): error is TableShapeError | RowValidationError | CsvFormatError {
    return error instanceof TableShapeError
        || error instanceof RowValidationError
        || error instanceof CsvFormatError;
}

/* -------------------------------------------------------------------------- */
/*                              Main Entrypoint                                */
/* -------------------------------------------------------------------------- */

/**
 * Runs the tool and resolves with its exit code.
 */
export async function runHashPins(
    argv: string[],
    env: NodeJS.ProcessEnv = process.env,
    io: ConsoleLike = console,
): Promise<number> {
    const parsed = parseOptions(argv, env);
    switch (parsed.kind) {
        case 'help':
            io.log(USAGE);
            return EXIT_OK;
        case 'usage-error':
            io.error(parsed.message);
            io.error(USAGE);
            return EXIT_USAGE;
    }

    const { infile, outfile, salt } = parsed.options;

    let text: string;
    try {
        text = await readFile(infile, 'utf8');
    } catch (error) {
        io.error(`Cannot read ${infile}: ${error instanceof Error ? error.message : String(error)}`);
        return EXIT_INVALID_INPUT;
    }

    try {
        const { table } = hashPinTable(parseCsv(text), salt);
        await writeFile(outfile, formatCsv(table), 'utf8');
        io.log(`Wrote ${outfile} (${table.rows.length} members)`);
        return EXIT_OK;
    } catch (error) {
        if (isInputError(error)) {
            io.error(error.message);
            return EXIT_INVALID_INPUT;
        }
        throw error;
    }
}

if (require.main === module) {
    runHashPins(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error('hash-pins failed', error);
            process.exitCode = EXIT_INVALID_INPUT;
        });
}
