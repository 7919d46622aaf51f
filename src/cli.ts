#!/usr/bin/env node
import 'dotenv/config';
import { writeFileSync } from 'fs';
import * as readline from 'readline';
import chalk from 'chalk';
import boxen from 'boxen';
import { resolveConfig } from './config.js';
import { defaultCandidatePaths } from './kb/loader.js';
import { KnowledgeBase, openKnowledgeBase } from './kb/model.js';
import { OverlapAdvisor } from './advisor/overlap.js';
import { AtlasSession } from './session/atlasSession.js';
import { constructCard } from './views/cards.js';
import { partitionKeys } from './views/selection.js';
import { modelTableToCsv } from './export/csv.js';
import { isAtlasException } from './types/errors.js';
import type { LoadNotice } from './types/knowledgeBase.js';
import { DEFAULTS } from './types/options.js';
import {
    renderCard,
    renderConstructList,
    renderMeasures,
    renderModelList,
    renderModelTable,
    renderTaxonomy,
    renderVectorTable,
} from './apps/cli/render.js';

const VERSION = '0.3.0';
const HELP = `
Construct Atlas v${VERSION}

Usage:
  construct-atlas taxonomy                 List component dimensions
  construct-atlas list [query]             List constructs (search label/synonyms)
  construct-atlas show <keys...>           Show construct cards
  construct-atlas compare <keys...>        Warnings, cards, components and measures
  construct-atlas models [--domain=<d>]    List comparison models
  construct-atlas model-table <keys...>    Compare models by dimension
  construct-atlas repl                     Interactive mode

Options:
  --file=<path>      Knowledge base document (default: constructs.yaml lookup)
  --domain=<name>    Model domain filter ("${DEFAULTS.allDomains}" for every model)
  --csv=<file>       Write the model table as CSV
  --quiet, -q        Hide load notices
  --help, -h         Show this help
  --version, -v      Show version

Environment:
  CONSTRUCT_ATLAS_FILE       Explicit knowledge base path
  CONSTRUCT_ATLAS_FILENAME   File name looked up in the standard locations
`;

const args = process.argv.slice(2);
const quiet = args.includes('--quiet') || args.includes('-q');

const flags: Record<string, string> = {};
const cleanArgs: string[] = [];
const VALUE_FLAGS = ['file', 'domain', 'csv'];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const match = /^--([a-z-]+)(?:=(.*))?$/.exec(arg);
    if (match && VALUE_FLAGS.includes(match[1])) {
        if (match[2] !== undefined) {
            flags[match[1]] = match[2];
        } else if (i + 1 < args.length) {
            flags[match[1]] = args[i + 1];
            i++;
        }
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const commandName = cleanArgs[0];
const operands = cleanArgs.slice(1);

function printNotice(notice: LoadNotice): void {
    if (!quiet) {
        console.warn(chalk.yellow(`notice: ${notice.message}`));
    }
}

function open(): KnowledgeBase {
    const config = resolveConfig(process.env, flags.file ? { explicitPath: flags.file } : {});
    const candidates = defaultCandidatePaths(config);
    try {
        const { kb, result } = openKnowledgeBase({ candidates, onNotice: printNotice });
        if (!quiet) {
            console.log(chalk.dim(`Knowledge base: ${result.source}${kb.schemaVersion ? ` (schema ${kb.schemaVersion})` : ''}`));
        }
        return kb;
    } catch (e) {
        if (isAtlasException(e)) {
            console.error(chalk.red(`Error [${e.code}]: ${e.message}`));
            if (e.error.suggestion) console.error(chalk.dim(e.error.suggestion));
            process.exit(1);
        }
        throw e;
    }
}

/**
 * Known keys, with unknown ones reported. Exits when nothing is left.
 */
function requireKeys(requested: readonly string[], known: readonly string[], kind: string): string[] {
    const { valid, unknown } = partitionKeys(requested, known);
    for (const key of unknown) {
        console.error(chalk.red(`Unknown ${kind}: ${key}`));
    }
    if (valid.length === 0) {
        console.error(`No valid ${kind} keys given. Available: ${known.join(', ')}`);
        process.exit(1);
    }
    return valid;
}

function printWarnings(warnings: readonly string[]): void {
    for (const w of warnings) {
        console.log(chalk.yellow(`⚠ ${w}`));
    }
}

function printCards(kb: KnowledgeBase, keys: readonly string[]): void {
    for (const key of keys) {
        console.log(boxen(renderCard(constructCard(kb, key)), { padding: { left: 1, right: 1, top: 0, bottom: 0 } }));
    }
}

function printCompare(kb: KnowledgeBase, keys: readonly string[], advisor: OverlapAdvisor): void {
    printWarnings(advisor.warnings(keys));
    printCards(kb, keys);
    console.log(chalk.bold('\nComponent coverage'));
    console.log(renderVectorTable(kb, keys));
    console.log(chalk.bold('\nMeasures used'));
    console.log(renderMeasures(kb.measureRows(keys)));
}

function exportCsv(csv: string, file: string): void {
    writeFileSync(file, csv, 'utf-8');
    console.log(chalk.green(`✓ Wrote ${file}`));
}

async function main() {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    const kb = open();
    const advisor = new OverlapAdvisor();

    switch (commandName) {
        case 'taxonomy':
            console.log(renderTaxonomy(kb));
            break;
        case 'list':
            console.log(renderConstructList(kb, kb.searchConstructs(operands.join(' '))));
            break;
        case 'show':
            printCards(kb, requireKeys(operands, kb.allConstructKeys(), 'construct'));
            break;
        case 'compare':
            printCompare(kb, requireKeys(operands, kb.allConstructKeys(), 'construct'), advisor);
            break;
        case 'models': {
            const domain = flags.domain ?? DEFAULTS.allDomains;
            console.log(chalk.dim(`Domains: ${kb.domains().join(', ') || '(none)'}`));
            console.log(renderModelList(kb, kb.modelsByDomain(domain)));
            break;
        }
        case 'model-table': {
            const keys = requireKeys(operands, kb.allModelKeys(), 'model');
            const table = kb.modelDimensionTable(keys);
            console.log(renderModelTable(table));
            if (flags.csv) exportCsv(modelTableToCsv(table), flags.csv);
            break;
        }
        case 'repl':
            return runRepl(kb, advisor);
        default:
            console.error(`Unknown command: ${commandName}`);
            console.log(HELP);
            process.exit(1);
    }
}

async function runRepl(kb: KnowledgeBase, advisor: OverlapAdvisor): Promise<void> {
    const session = new AtlasSession(kb, advisor);

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'atlas> '
    });

    console.log(`Construct Atlas REPL v${VERSION}`);
    console.log('Commands: .search <q>, .select <keys>, .compare, .models [domain], .table <keys>, .export <file>, .quit, .help\n');
    rl.prompt();

    rl.on('line', (line) => {
        const trimmed = line.trim();
        const [cmd = '', ...rest] = trimmed.split(/\s+/);

        switch (cmd) {
            case '.help':
                console.log('Commands:');
                console.log('  .search <text>      Filter constructs by label or synonym (blank clears)');
                console.log('  .select <keys...>   Choose constructs to compare');
                console.log('  .compare            Show warnings, cards, components and measures');
                console.log('  .models [domain]    Filter comparison models by domain');
                console.log('  .table <keys...>    Compare models by dimension');
                console.log('  .export <file>      Write the current model table as CSV');
                console.log('  .quit, .exit, .q    Exit REPL');
                break;
            case '.search': {
                const visible = session.search(rest.join(' '));
                console.log(renderConstructList(kb, visible));
                console.log(chalk.dim(`Selected: ${session.getSelection().join(', ') || '(none)'}`));
                break;
            }
            case '.select': {
                const unknown = session.select(rest);
                for (const key of unknown) console.log(chalk.red(`✗ Not offered: ${key}`));
                console.log(chalk.dim(`Selected: ${session.getSelection().join(', ') || '(none)'}`));
                break;
            }
            case '.compare': {
                const selection = session.getSelection();
                if (selection.length === 0) {
                    console.log('Use .select to choose one or more constructs to compare.');
                    break;
                }
                printCompare(kb, selection, advisor);
                break;
            }
            case '.models': {
                const offered = session.filterDomain(rest[0] ?? DEFAULTS.allDomains);
                console.log(renderModelList(kb, offered));
                break;
            }
            case '.table': {
                const unknown = session.selectModels(rest);
                for (const key of unknown) console.log(chalk.red(`✗ Not offered: ${key}`));
                console.log(renderModelTable(session.modelTable()));
                break;
            }
            case '.export': {
                if (!rest[0]) {
                    console.log(chalk.red('Usage: .export <file>'));
                    break;
                }
                const table = session.modelTable();
                if (table.models.length === 0) {
                    console.log(chalk.red('No models selected; use .table first.'));
                    break;
                }
                try {
                    exportCsv(modelTableToCsv(table), rest[0]);
                } catch (e) {
                    console.log(chalk.red(`✗ Failed to write file: ${(e as Error).message}`));
                }
                break;
            }
            case '.quit':
            case '.exit':
            case '.q':
                rl.close();
                return;
            case '':
                break;
            default:
                console.log(`Unknown command: ${cmd}. Type .help for commands.`);
        }
        rl.prompt();
    });

    rl.on('close', () => {
        process.exit(0);
    });
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
