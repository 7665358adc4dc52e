#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, parseLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../types/index.js';
import type { PaperService } from '../service/paper-service.js';

const VERSION = '1.0.0';

interface GlobalOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    email?: string;
}

interface SearchOptions {
    query?: string;
    provider?: string;
    subjects?: string;
    datePublishedGte?: string;
}

function parseLevelOption(value: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Expected one of: error, warn, info, debug, silent.');
    }
    return level;
}

function parseDateOption(value: string): string {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
    }
    return value;
}

/**
 * Resolve configuration, start logging, then build the service.
 * The service modules are loaded after initLogger so their module-level
 * loggers use the configured level and format.
 */
async function createService(command: Command): Promise<PaperService> {
    const opts = command.optsWithGlobals<GlobalOptions>();

    const cliFlags: ConfigOverrides = {};
    if (opts.logLevel) cliFlags.logLevel = opts.logLevel;
    if (opts.jsonLogs) cliFlags.jsonLogs = true;
    if (opts.email) cliFlags.email = opts.email;

    const config = await resolveConfig(cliFlags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const { getHttpClient } = await import('../utils/http-client.js');
    const { PaperService } = await import('../service/paper-service.js');

    const httpClient = getHttpClient({
        timeout: config.timeouts.request,
        version: VERSION,
        email: config.email,
    });
    return new PaperService({ config, httpClient });
}

/**
 * Results go to stdout as JSON; an error result sets a failing exit code.
 */
function printResult(result: { status: 'success' | 'error' }): void {
    console.log(JSON.stringify(result, null, 2));
    if (result.status === 'error') {
        process.exitCode = 1;
    }
}

const program = new Command();

program
    .name('preprint-bridge')
    .description('Search arXiv, OSF preprint providers and OpenAlex; fetch metadata and PDF content as markdown.')
    .version(VERSION)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevelOption)
    .option('--json-logs', 'Output JSON logs')
    .option('--email <address>', 'Contact email for User-Agent and the OpenAlex polite pool');

// ─── PROVIDERS command ────────────────────────────────────

program
    .command('providers')
    .description('List every provider id usable with search')
    .action(async (_opts: object, command: Command) => {
        const service = await createService(command);
        printResult(await service.listProviders());
    });

// ─── SEARCH command ───────────────────────────────────────

program
    .command('search')
    .description('Search one provider, or all sources when no provider is given')
    .option('-q, --query <text>', 'Free-text query')
    .option('-p, --provider <id>', 'Provider id (see `providers`)')
    .option('-s, --subjects <subjects>', 'Subject / category / concept filter')
    .option('--date-published-gte <date>', 'Published on or after (YYYY-MM-DD)', parseDateOption)
    .action(async (opts: SearchOptions, command: Command) => {
        const service = await createService(command);
        printResult(await service.search({
            query: opts.query,
            provider: opts.provider,
            subjects: opts.subjects,
            datePublishedGte: opts.datePublishedGte,
        }));
    });

// ─── METADATA command ─────────────────────────────────────

program
    .command('metadata')
    .description('Fetch metadata for an arXiv, OpenAlex or OSF id')
    .argument('<id>', 'Paper id, e.g. 2407.06405v1, W4385245566 or an OSF id')
    .action(async (id: string, _opts: object, command: Command) => {
        const service = await createService(command);
        printResult(await service.getPaperMetadata(id));
    });

// ─── CONTENT commands ─────────────────────────────────────

program
    .command('content')
    .description('Download a paper by id and convert it to markdown')
    .argument('<id>', 'Paper id')
    .action(async (id: string, _opts: object, command: Command) => {
        const service = await createService(command);
        printResult(await service.getPaperContent(id));
    });

program
    .command('content-url')
    .description('Download a PDF from a direct URL and convert it to markdown')
    .argument('<url>', 'PDF URL')
    .action(async (url: string, _opts: object, command: Command) => {
        const service = await createService(command);
        printResult(await service.getPaperContentByUrl(url));
    });

program.parseAsync().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
});
