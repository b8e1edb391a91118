#!/usr/bin/env node
/**
 * pricesheet CLI
 *
 * Commands:
 * - pricesheet status            - Template and sheet-link readiness
 * - pricesheet check <input>     - Refresh status and validate SKU/price pairs
 * - pricesheet build <input>     - Validate, then write the filled price file
 * - pricesheet template init     - Write a starter template
 */

import { config as dotenvConfig } from 'dotenv';

// .env from the working directory, before any PRICESHEET_* lookup
dotenvConfig();

import { readFile, writeFile, mkdir } from 'fs/promises';
import { join, resolve } from 'path';
import { Command } from 'commander';
import { loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { PriceSheetError } from '../errors';
import { parsePastedPairs } from '../import/paste';
import { createReferenceCache } from '../reference/cache';
import { createSessionManager, assertRowCount } from '../session/index';
import type { Evaluation, PriceSession, SessionManager } from '../session/index';
import { createBlankTemplate, templateExists } from '../template/writer';
import type { Config } from '../types';

const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

// =============================================================================
// Helpers
// =============================================================================

interface GlobalOptions {
  config?: string;
}

interface PipelineOptions {
  rows?: string;
  sheet?: string;
  refresh: boolean;
}

interface BuildOptions extends PipelineOptions {
  name?: string;
  out?: string;
  confirmUnpublished?: boolean;
}

async function readInput(input: string): Promise<string> {
  if (input !== '-') {
    return readFile(resolve(input), 'utf-8');
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function ok(text: string): string {
  return `${GREEN}✓ ${text}${RESET}`;
}

function fail(text: string): string {
  return `${RED}✗ ${text}${RESET}`;
}

function printList(title: string, items: string[], empty: string): void {
  console.log(`\n  ${BOLD}${title}${RESET}`);
  if (items.length === 0) {
    console.log(`    ${empty}`);
    return;
  }
  for (const item of items) console.log(`    ${item}`);
}

function printTable(session: PriceSession): void {
  const filled = session.rows
    .map((row, i) => ({ row, line: i + 1 }))
    .filter(({ row }) => row.sku.trim() || row.newPrice.trim());
  if (filled.length === 0) return;

  console.log(`\n  ${BOLD}Row  SKU                     New Price   Publish Status        Current Price${RESET}`);
  for (const { row, line } of filled) {
    console.log(
      `  ${String(line).padEnd(4)} ${row.sku.padEnd(23)} ${row.newPrice.padEnd(11)} ${row.publishStatus.padEnd(21)} ${String(row.currentPrice)}`,
    );
  }
}

function printEvaluation(evaluation: Evaluation): void {
  const { summary, validation } = evaluation;
  const color = summary.level === 'ok' ? GREEN : summary.level === 'warning' ? YELLOW : RED;

  console.log(`\n  Rows filled: ${summary.filledCount}`);
  console.log(`  ${color}${summary.message}${RESET}`);

  printList('SKU Not Found', validation.notFoundSKUs, 'No SKUs in Not Found state.');
  printList('Unpublished SKU', validation.unpublishedSKUs, 'No Unpublished SKUs.');

  const headlineColor = validation.hardErrors.length > 0 ? RED : validation.unpublishedSKUs.length > 0 ? YELLOW : GREEN;
  console.log(`\n  ${headlineColor}${evaluation.headline}${RESET}`);
  for (const error of validation.hardErrors) console.log(`    - ${error}`);
}

/**
 * Load pairs into a fresh session sized to fit them, then refresh status.
 */
async function runPipeline(
  manager: SessionManager,
  config: Config,
  input: string,
  options: PipelineOptions,
): Promise<PriceSession> {
  const session = manager.getOrCreateSession();
  if (options.sheet) manager.setSheetLink(session.id, options.sheet);

  const { pairs, headerSkipped } = parsePastedPairs(await readInput(input));
  if (headerSkipped) logger.debug('Header line skipped');

  const rowCount = options.rows
    ? assertRowCount(Number(options.rows), config.table.maxRows)
    : Math.min(Math.max(pairs.length, 1), config.table.maxRows);
  manager.setRowCount(session.id, rowCount);

  const outcome = manager.paste(session.id, pairs);
  if (outcome.dropped > 0) {
    console.log(`${YELLOW}  ${outcome.dropped} pair(s) did not fit in ${rowCount} rows and were skipped${RESET}`);
  }

  if (options.refresh) {
    await manager.refreshStatus(session.id);
    console.log(ok('Status updated from reference sheet.'));
  }
  return session;
}

function createManager(config: Config): SessionManager {
  return createSessionManager({
    config,
    cache: createReferenceCache({ ttlMs: config.sheet.cacheTtlMs }),
  });
}

function reportError(error: unknown): void {
  if (error instanceof PriceSheetError) {
    console.error(fail(error.message));
    logger.debug({ code: error.code, err: error }, 'Command failed');
  } else {
    logger.error({ err: error }, 'Command failed');
  }
  process.exitCode = 1;
}

// =============================================================================
// Program
// =============================================================================

const program = new Command();

program
  .name('pricesheet')
  .description('Prepare bulk price-update files: status lookup, validation and template filling')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to pricesheet.json');

function globalConfig(): Config {
  const { config } = program.opts<GlobalOptions>();
  return loadConfig({ configPath: config ? resolve(config) : undefined });
}

function addPipelineOptions(command: Command): Command {
  return command
    .option('-r, --rows <count>', 'Table size (1-1000); defaults to the number of input pairs')
    .option('-s, --sheet <link>', 'Shared link of the reference status sheet')
    .option('--no-refresh', 'Skip the reference-sheet status lookup');
}

// ============================================================================
// status - Readiness
// ============================================================================
program
  .command('status')
  .description('Show template and reference-sheet readiness')
  .option('-s, --sheet <link>', 'Shared link of the reference status sheet')
  .action((options: { sheet?: string }) => {
    try {
      const config = globalConfig();
      const manager = createManager(config);
      const session = manager.getOrCreateSession();
      if (options.sheet) manager.setSheetLink(session.id, options.sheet);
      const readiness = manager.checkReadiness(session.id);

      console.log(`\n${BOLD}pricesheet status${RESET}\n`);
      console.log(`  Template: ${readiness.templateFound ? ok('Template found') : fail(`Template missing (${readiness.templatePath})`)}`);
      console.log(`  Reference sheet: ${readiness.sheetLinkValid ? ok('CSV source ready') : fail('Invalid sheet link')}`);
      console.log(`  Unpublished policy: ${config.validation.unpublishedPolicy}`);
      console.log('  Sheet must be shared as: Anyone with the link → Viewer\n');
      if (!readiness.templateFound || !readiness.sheetLinkValid) process.exitCode = 1;
    } catch (error) {
      reportError(error);
    }
  });

// ============================================================================
// check - Validate without writing
// ============================================================================
addPipelineOptions(
  program
    .command('check <input>')
    .description('Look up status and validate SKU / New Price pairs (file path or - for stdin)'),
).action(async (input: string, options: PipelineOptions) => {
  try {
    const config = globalConfig();
    const manager = createManager(config);
    const session = await runPipeline(manager, config, input, options);
    const evaluation = manager.evaluate(session.id);
    printTable(session);
    printEvaluation(evaluation);
    console.log('');
    if (evaluation.validation.hardErrors.length > 0) process.exitCode = 1;
  } catch (error) {
    reportError(error);
  }
});

// ============================================================================
// build - Write the filled template
// ============================================================================
addPipelineOptions(
  program
    .command('build <input>')
    .description('Validate pairs and write the filled price-update workbook'),
)
  .option('-n, --name <filename>', 'Output file name (sanitized; .xlsx appended)')
  .option('-o, --out <dir>', 'Output directory')
  .option('--confirm-unpublished', 'Proceed even if SKU are Unpublished (include them in file)')
  .action(async (input: string, options: BuildOptions) => {
    try {
      const config = globalConfig();
      const manager = createManager(config);
      const session = await runPipeline(manager, config, input, options);
      const evaluation = manager.evaluate(session.id);
      printEvaluation(evaluation);

      const file = await manager.prepareDownload(session.id, {
        filename: options.name,
        confirmUnpublished: options.confirmUnpublished,
      });
      const dir = resolve(options.out ?? config.output.dir);
      await mkdir(dir, { recursive: true });
      const target = join(dir, file.filename);
      await writeFile(target, file.bytes);
      console.log(`\n${ok(`Wrote ${file.rowCount} row(s) to ${target}`)}\n`);
    } catch (error) {
      reportError(error);
    }
  });

// ============================================================================
// template init - Starter template
// ============================================================================
const template = program.command('template').description('Template helpers');

template
  .command('init [path]')
  .description('Write a starter template at the configured (or given) path')
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (path: string | undefined, options: { force?: boolean }) => {
    try {
      const config = globalConfig();
      const target = resolve(path ?? config.template.path);
      if (templateExists(target) && !options.force) {
        console.log(fail(`${target} already exists (use --force to overwrite)`));
        process.exitCode = 1;
        return;
      }
      await createBlankTemplate(target, config.template.layout);
      console.log(ok(`Template written to ${target}`));
    } catch (error) {
      reportError(error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error);
});
