#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { CancelledError, errorMessage } from '../utils/errors.js';
import { KnowledgeGraphBuilder } from '../builder/pipeline.js';
import { KnowledgeGraphManager } from '../graph/knowledge-graph.js';
import { EXPORT_FORMATS, exportGraph } from '../exporters/export.js';
import { generateViewer } from '../viewer/html-viewer.js';
import { SqliteGraphStore } from '../storage/database.js';
import type { DocumentInput, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('finkg')
    .description('Build an incrementally updated knowledge graph of entities, relations and events from financial text.')
    .version(VERSION);

interface CommonOptions {
    db?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface IngestCommandOptions extends CommonOptions {
    referenceDate?: string;
    category?: string;
}

interface OutputCommandOptions extends CommonOptions {
    out?: string;
}

function overridesFrom(opts: CommonOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (opts.db) overrides.storage = { path: opts.db };
    if (opts.logLevel) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;
    return overrides;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'Graph database path')
        .option('--log-level <level>', 'Log level: silent | error | warn | info | debug')
        .option('--json-logs', 'Output JSON logs');
}

// ─── INGEST command ───────────────────────────────────────

withCommonOptions(
    program
        .command('ingest')
        .description('Extract entities, relations and events from text files into the graph')
        .argument('<files...>', 'UTF-8 text files, one document each')
        .option('--reference-date <date>', 'Reference date (YYYY-MM-DD) for relative time expressions')
        .option('--category <label>', 'Category tag for documents that carry none')
).action(async (files: string[], opts: IngestCommandOptions) => {
    const config = await resolveConfig(overridesFrom(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    const logger = getLogger();

    const inputs: DocumentInput[] = files.map((file) => {
        const raw = readFileSync(file, 'utf-8');
        const text = opts.category && !raw.trimStart().startsWith('[') ? `[${opts.category}] ${raw}` : raw;
        return { id: basename(file, extname(file)), text, referenceDate: opts.referenceDate ?? null };
    });

    const store = new SqliteGraphStore(config.storage.path);
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once('SIGINT', onSigint);

    try {
        const builder = new KnowledgeGraphBuilder(config, { store });
        const report = await builder.ingest(inputs, { signal: controller.signal });

        store.insertRun({
            created_at: new Date().toISOString(),
            finkg_version: VERSION,
            config_json: JSON.stringify(config),
            stats_json: JSON.stringify({ ...report.totals, retries: report.retries, durationMs: report.durationMs }),
        });

        for (const doc of report.documents) {
            const detail = doc.error ? ` (${doc.error})` : '';
            console.log(
                `  ${doc.status.padEnd(9)} ${doc.documentId}: ${doc.mentions} mentions, ${doc.relations} relations, ${doc.events} events${detail}`
            );
        }
        if (report.reviewItems.length > 0) {
            console.log(`\n  ${report.reviewItems.length} merge(s) need review; run "finkg review" to list them.`);
        }
        if (report.documents.some((d) => d.status === 'failed')) {
            process.exitCode = 1;
        }
    } catch (error) {
        if (error instanceof CancelledError) {
            logger.warn('Ingest cancelled; the document in progress was rolled back');
            process.exitCode = 130;
        } else {
            logger.error({ error: errorMessage(error) }, 'Ingest failed');
            process.exitCode = 1;
        }
    } finally {
        process.off('SIGINT', onSigint);
        store.close();
    }
});

// ─── EXPORT command ───────────────────────────────────────

withCommonOptions(
    program
        .command('export')
        .description('Export graph to JSON, GraphML, CSV, or Mermaid')
        .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
        .option('-o, --out <path>', 'Output file path')
).action(async (opts: OutputCommandOptions & { format: string }) => {
    const format = EXPORT_FORMATS.find((f) => f === opts.format.toLowerCase());
    if (!format) {
        console.error(`Invalid format: ${opts.format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
        process.exit(1);
    }

    const config = await resolveConfig(overridesFrom(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const extensions: Record<string, string> = {
        json: '.json',
        graphml: '.graphml',
        csv: '.csv',
        mermaid: '.md',
    };
    const outputPath = opts.out ?? config.storage.path.replace(/\.db$/, '') + (extensions[format] ?? '.out');

    const store = new SqliteGraphStore(config.storage.path);
    try {
        exportGraph(store, outputPath, format);
        console.log(`Exported to ${outputPath}`);
    } catch (error) {
        console.error('Export failed:', errorMessage(error));
        process.exitCode = 1;
    } finally {
        store.close();
    }
});

// ─── VIEW command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('view')
        .description('Generate a self-contained HTML viewer')
        .option('-o, --out <path>', 'Output HTML file path')
).action(async (opts: OutputCommandOptions) => {
    const config = await resolveConfig(overridesFrom(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    const outputPath = opts.out ?? config.storage.path.replace(/\.db$/, '') + '.html';

    const store = new SqliteGraphStore(config.storage.path);
    try {
        generateViewer(store.readSnapshot(), outputPath);
        console.log(`Viewer generated: ${outputPath}`);
    } catch (error) {
        console.error('View generation failed:', errorMessage(error));
        process.exitCode = 1;
    } finally {
        store.close();
    }
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect').description('Show database statistics')).action(
    async (opts: CommonOptions) => {
        const config = await resolveConfig(overridesFrom(opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const store = new SqliteGraphStore(config.storage.path);
        try {
            const stats = store.getStats();

            console.log('\nKnowledge Graph Statistics\n');
            console.log(`  Documents:    ${stats.documents}`);
            console.log(`  Entities:     ${stats.entities} (${stats.retiredEntities} merged away)`);
            console.log(`  Relations:    ${stats.relations}`);
            console.log(`  Events:       ${stats.events}`);
            console.log(`  Time refs:    ${stats.temporals}`);
            console.log(`  Review items: ${stats.reviewItems}`);
            console.log(`  Runs:         ${stats.runs}`);

            if (Object.keys(stats.relationsByPredicate).length > 0) {
                console.log('\n  Predicates:');
                for (const [predicate, count] of Object.entries(stats.relationsByPredicate)) {
                    console.log(`    ${predicate}: ${count}`);
                }
            }
            if (Object.keys(stats.eventsByType).length > 0) {
                console.log('\n  Event types:');
                for (const [type, count] of Object.entries(stats.eventsByType)) {
                    console.log(`    ${type}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', errorMessage(error));
            process.exitCode = 1;
        } finally {
            store.close();
        }
    }
);

// ─── REVIEW command ───────────────────────────────────────

withCommonOptions(program.command('review').description('List entity merges waiting for review')).action(
    async (opts: CommonOptions) => {
        const config = await resolveConfig(overridesFrom(opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const store = new SqliteGraphStore(config.storage.path);
        try {
            const items = store.readReviewItems();
            if (items.length === 0) {
                console.log('No merges waiting for review.');
                return;
            }
            for (const item of items) {
                const [a, b] = item.surfaces;
                console.log(`  ${item.score.toFixed(3)}  "${a}" ~ "${b}"  [${item.key}]`);
            }
        } finally {
            store.close();
        }
    }
);

// ─── TIMELINE command ─────────────────────────────────────

withCommonOptions(
    program
        .command('timeline')
        .description('List dated events in time order')
        .option('--entity <id>', 'Only events this entity takes part in')
).action(async (opts: CommonOptions & { entity?: string }) => {
    const config = await resolveConfig(overridesFrom(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const store = new SqliteGraphStore(config.storage.path);
    try {
        const { entries, links } = KnowledgeGraphManager.fromSnapshot(store.readSnapshot()).timeline(opts.entity);
        if (entries.length === 0) {
            console.log('No dated events.');
            return;
        }
        for (const entry of entries) {
            console.log(`  ${entry.start.padEnd(10)}  ${entry.type}  [${entry.eventKey}]`);
        }
        if (links.length > 0) {
            console.log('\n  Order:');
            for (const link of links) {
                console.log(`    ${link.fromEventKey} before ${link.toEventKey} (${link.timeDiff})`);
            }
        }
    } finally {
        store.close();
    }
});

program.parseAsync().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
});
