#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { FetchCoordinator } from '../coordinator/fetch-coordinator.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { toFetchError } from '../utils/fetch-error.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import {
    ALL_SOURCES,
    isSearchField,
    Source,
    parseSource,
    type IdOperation,
    type NormalizedRecord,
    type RequestFilters,
    type SearchField,
    type SortOrder,
} from '../types/index.js';

const VERSION = '0.1.0';

interface CommonCliOptions {
    config?: string;
    email?: string;
    logLevel?: string;
    jsonLogs: boolean;
}

interface IdCliOptions extends CommonCliOptions {
    source: Source;
}

interface SearchCliOptions extends CommonCliOptions {
    source: Source[];
    limit: number;
    offset: number;
    from?: string;
    to?: string;
    recentDays?: number;
    fields?: SearchField[];
    sort?: SortOrder;
}

// ─── Option parsers ───────────────────────────────────────

function parseInteger(value: string): number {
    const number = Number(value);
    if (!Number.isInteger(number) || number < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return number;
}

function parseSourceOption(value: string): Source {
    const source = parseSource(value);
    if (!source) {
        throw new InvalidArgumentError(`Expected one of: ${ALL_SOURCES.join(', ')}.`);
    }
    return source;
}

function parseSourceList(value: string): Source[] {
    if (value.trim().toLowerCase() === 'all') return [...ALL_SOURCES];
    return value.split(',').map((name) => parseSourceOption(name.trim()));
}

function parseFields(value: string): SearchField[] {
    return value.split(',').map((name) => {
        const field = name.trim().toLowerCase();
        if (!isSearchField(field)) {
            throw new InvalidArgumentError('Expected a comma-separated list of: title, abstract, author, all.');
        }
        return field;
    });
}

function parseSort(value: string): SortOrder {
    if (value !== 'relevance' && value !== 'date') {
        throw new InvalidArgumentError('Expected relevance or date.');
    }
    return value;
}

// ─── Helpers ──────────────────────────────────────────────

function cliOverrides(opts: CommonCliOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const logLevel = parseLogLevel(opts.logLevel);
    if (logLevel) overrides.logLevel = logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;
    if (opts.email) overrides.email = opts.email;
    return overrides;
}

async function createCoordinator(opts: CommonCliOptions): Promise<FetchCoordinator> {
    const config = await resolveConfig(cliOverrides(opts), { configPath: opts.config });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return new FetchCoordinator({ config, version: VERSION });
}

/**
 * Abort in-flight work on Ctrl+C.
 */
function interruptSignal(): AbortSignal {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    return controller.signal;
}

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function fail(message: string, error: unknown): void {
    getLogger().error({ error: toFetchError(error).toJSON() }, message);
    process.exitCode = 1;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Config file (default: scifetch.config.json or .scifetchrc.json)')
        .option('--email <address>', 'Contact address for the User-Agent and CrossRef polite pool')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false);
}

const program = new Command();

program
    .name('scifetch')
    .description('Rate-limited, cached access to PubMed, PMC, arXiv, MedGen, ClinVar and CrossRef.')
    .version(VERSION);

// ─── SEARCH command ───────────────────────────────────────

withCommonOptions(
    program
        .command('search')
        .description('Search one or more sources')
        .argument('<query>', 'Search query')
        .option('-s, --source <sources>', 'Comma-separated sources, or "all"', parseSourceList, [Source.PubMed])
        .option('-l, --limit <n>', 'Maximum records per source', parseInteger, 20)
        .option('--offset <n>', 'Index of the first record', parseInteger, 0)
        .option('--from <date>', 'Earliest publication date (YYYY[-MM[-DD]])')
        .option('--to <date>', 'Latest publication date (YYYY[-MM[-DD]])')
        .option('--recent-days <n>', 'Only records added in the last N days', parseInteger)
        .option('--fields <fields>', 'Restrict to fields: title,abstract,author,all', parseFields)
        .option('--sort <order>', 'relevance | date', parseSort)
).action(async (query: string, opts: SearchCliOptions) => {
    const coordinator = await createCoordinator(opts);
    const filters: RequestFilters = {
        dateFrom: opts.from,
        dateTo: opts.to,
        recentDays: opts.recentDays,
        fields: opts.fields,
        sort: opts.sort,
    };
    const template = {
        operation: 'search' as const,
        query,
        paging: { offset: opts.offset, limit: opts.limit },
        filters,
    };
    const signal = interruptSignal();

    if (opts.source.length === 1 && opts.source[0]) {
        const source = opts.source[0];
        try {
            const records = await coordinator.request({ ...template, source }, { signal });
            printJson({ [source]: records });
        } catch (error) {
            fail('Search failed', error);
        }
        return;
    }

    const { records, errors } = await coordinator.fanOut(template, opts.source, { signal });
    const output: { results: Record<string, readonly NormalizedRecord[]>; errors: Record<string, unknown> } = {
        results: Object.fromEntries(records),
        errors: {},
    };
    for (const [source, error] of errors) {
        output.errors[source] = error.toJSON();
        getLogger().warn({ source, kind: error.kind }, error.message);
    }
    printJson(output);

    if (records.size === 0) {
        process.exitCode = 1;
    }
});

// ─── FETCH / METADATA / LINKS commands ────────────────────

const ID_COMMANDS: Array<{ operation: IdOperation; description: string }> = [
    { operation: 'fetch', description: 'Fetch a full record by id (PMID, arXiv id, UID or DOI)' },
    { operation: 'metadata', description: 'Fetch the summary of a record by id' },
    { operation: 'links', description: 'List PubMed records linked to an Entrez record (PubMed, PMC, MedGen, ClinVar)' },
];

for (const { operation, description } of ID_COMMANDS) {
    withCommonOptions(
        program
            .command(operation)
            .description(description)
            .argument('<id>', 'Record identifier')
            .option('-s, --source <source>', 'Source to query', parseSourceOption, Source.PubMed)
    ).action(async (id: string, opts: IdCliOptions) => {
        const coordinator = await createCoordinator(opts);
        try {
            const records = await coordinator.request({ source: opts.source, operation, id }, { signal: interruptSignal() });
            printJson(operation === 'links' ? records : records[0]);
        } catch (error) {
            fail(`${operation} failed`, error);
        }
    });
}

await program.parseAsync(process.argv);
