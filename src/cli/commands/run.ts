import { writeFileSync } from 'node:fs';
import { relative } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import {
  loadConfig,
  loadCaseFile,
  findCaseFiles,
  filterByCategory,
  DEFAULT_CASE_PATTERNS,
  type LoadConfigResult,
} from '../../config/index.js';
import { createClient, type AgentClient } from '../../client/index.js';
import {
  runBatch,
  summarizeResults,
  type BatchCase,
  type CaseResult,
  type RunSummary,
} from '../../runner/index.js';
import { errorMessage } from '../../scoring/index.js';

export interface RunOptions {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
  dryRun?: boolean;
  json?: boolean;
  output?: string;
  record?: string;
  replay?: string;
  category?: string;
  concurrency?: number;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function formatScore(score: number): string {
  return score.toFixed(3);
}

function printResult(result: CaseResult, log: (...args: string[]) => void): void {
  const label = `Case ${result.caseIndex}`;
  if (result.error !== undefined) {
    log(pc.red(`  ✗ ERROR`), label, pc.dim(`(${result.durationMs}ms)`));
    log(pc.red(`    ${result.error}`));
    return;
  }

  if (result.success) {
    log(pc.green(`  ✓ PASS`), label, pc.dim(`${formatScore(result.compositeScore)} (${result.durationMs}ms)`));
  } else {
    log(pc.red(`  ✗ FAIL`), label, pc.dim(`${formatScore(result.compositeScore)} (${result.durationMs}ms)`));
  }
  for (const metric of result.metrics.slice(0, 3)) {
    const color = metric.success ? pc.dim : pc.red;
    log(color(`    - ${metric.name}: ${metric.score.toFixed(2)} - ${metric.reason}`));
  }
}

function printSummary(summary: RunSummary, log: (...args: string[]) => void): void {
  log(pc.bold('─'.repeat(40)));
  log(
    pc.bold('Results:'),
    pc.green(`${summary.passed} passed`),
    summary.failed > 0 ? pc.red(`${summary.failed} failed`) : pc.dim('0 failed'),
    summary.errors > 0 ? pc.red(`(${summary.errors} errors)`) : ''
  );
  for (const metric of summary.metrics) {
    log(
      pc.dim(`  ${metric.name}:`),
      `avg ${metric.average.toFixed(3)},`,
      `${(metric.successRate * 100).toFixed(1)}% passing`
    );
  }
  if (summary.categories.length > 1) {
    log(pc.bold('By category:'));
    for (const category of summary.categories) {
      log(
        pc.dim(`  ${category.category}:`),
        `${category.passed}/${category.total} passed,`,
        `avg ${category.averageComposite.toFixed(3)}`
      );
    }
  }
}

export const runCommand = new Command('run')
  .description('Run evaluation case files')
  .argument('[patterns...]', 'Case file patterns (glob)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Verbose output')
  .option('--debug', 'Debug output (detailed request/response logs)')
  .option('-d, --dry-run', 'Validate cases without executing')
  .option('--json', 'Output results as JSON')
  .option('-o, --output <file>', 'Write the JSON report to a file')
  .option('--record <dir>', 'Record agent turns to directory')
  .option('--replay <dir>', 'Replay agent turns from directory')
  .option('--category <name>', 'Only run cases of this category')
  .option('--concurrency <n>', 'Cases to run at once', parseConcurrency)
  .action(async (patterns: string[], options: RunOptions) => {
    const verbose = options.verbose ?? false;
    const debugMode = options.debug ?? false;
    const jsonOutput = options.json ?? false;
    const recordDir = options.record;
    const replayDir = options.replay;

    // Validate mutually exclusive options
    if (recordDir && replayDir) {
      console.error(pc.red('Error: --record and --replay are mutually exclusive'));
      process.exit(1);
    }

    // Helper for conditional console output (suppressed in JSON mode)
    const log = jsonOutput ? () => {} : console.log;
    const logError = jsonOutput ? () => {} : console.error;

    const fail = (prefix: string, err: unknown): never => {
      if (jsonOutput) {
        console.log(JSON.stringify({ error: errorMessage(err) }, null, 2));
      } else {
        logError(pc.red(prefix), errorMessage(err));
      }
      process.exit(1);
    };

    // Load project config (a replay needs no target, so the file is optional)
    if (verbose) {
      log(pc.dim('Loading config...'));
    }

    let configResult: LoadConfigResult;
    try {
      configResult = loadConfig({ configPath: options.config, optional: Boolean(replayDir) });
    } catch (err) {
      return fail('Error:', err);
    }

    const config = configResult.config;
    if (verbose) {
      log(pc.dim(`Config loaded from: ${configResult.configPath ?? '(defaults)'}`));
      if (config.target) {
        log(pc.dim(`Endpoint: ${config.target.endpoint}`));
      }
    }

    // Find case files
    const casePatterns = patterns.length > 0 ? patterns : DEFAULT_CASE_PATTERNS;
    const cwd = process.cwd();

    if (verbose) {
      log(pc.dim(`Finding cases with patterns: ${casePatterns.join(', ')}`));
    }

    let caseFiles: string[];
    try {
      caseFiles = await findCaseFiles(casePatterns, cwd);
    } catch (err) {
      return fail('Error finding case files:', err);
    }

    if (caseFiles.length === 0) {
      if (jsonOutput) {
        console.log(JSON.stringify({ results: [], passed: 0, failed: 0 }, null, 2));
      } else {
        log(pc.yellow('No case files found.'));
      }
      process.exit(0);
    }

    log(pc.cyan(`Found ${caseFiles.length} case file(s)\n`));

    // Load and validate each case file
    let hasErrors = false;
    const batch: BatchCase[] = [];

    for (const filePath of caseFiles) {
      try {
        const { cases } = loadCaseFile(filePath);
        const selected = filterByCategory(cases, options.category);
        const caseFile = relative(cwd, filePath);
        cases.forEach((expected, i) => {
          if (selected.includes(expected)) {
            batch.push({ expected, caseIndex: i + 1, caseFile });
          }
        });
        if (verbose) {
          log(pc.green('  ✓'), pc.dim(filePath), pc.dim(`(${selected.length}/${cases.length} cases)`));
        }
      } catch (err) {
        hasErrors = true;
        logError(pc.red('  ✗'), filePath);
        logError(pc.red('   '), errorMessage(err));
      }
    }

    if (hasErrors) {
      logError(pc.red('\nSome case files failed validation.'));
      process.exit(1);
    }

    // Dry run mode - just validate
    if (options.dryRun) {
      if (jsonOutput) {
        console.log(JSON.stringify({
          validated: batch.map((c) => ({
            file: c.caseFile,
            case: c.caseIndex,
            tool: c.expected.expectedTool,
            category: c.expected.category,
          })),
        }, null, 2));
      } else {
        log(pc.green(`\n✓ Validated ${batch.length} case(s)`));
        for (const { expected, caseIndex, caseFile } of batch) {
          log(`  - ${caseFile}#${caseIndex} ${expected.expectedTool} [${expected.category}]`);
        }
      }
      process.exit(0);
    }

    // Create client (only needed for non-replay mode)
    let client: AgentClient | undefined;
    if (!replayDir) {
      try {
        client = createClient(config, {
          onDebug: debugMode && !jsonOutput ? (msg) => log(pc.dim(msg)) : undefined,
        });
      } catch (err) {
        return fail('Error:', err);
      }
    }

    // Execute cases
    log('');
    const results = await runBatch(batch, {
      config,
      client,
      recordDir,
      replayDir,
      concurrency: options.concurrency,
      verbose: verbose && !jsonOutput,
      onLog: (msg) => log(pc.dim(msg)),
      onDebug: debugMode && !jsonOutput ? (msg) => log(pc.dim(msg)) : undefined,
      onWarn: (msg) => logError(pc.yellow(`  ! ${msg}`)),
      onResult: (result) => printResult(result, log),
    });

    const summary = summarizeResults(results);
    const report = { summary, results };

    if (options.output) {
      try {
        writeFileSync(options.output, JSON.stringify(report, null, 2) + '\n');
        log(pc.dim(`Report written to: ${options.output}`));
      } catch (err) {
        return fail('Error writing report:', err);
      }
    }

    // Output results
    if (jsonOutput) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      log('');
      printSummary(summary, log);
    }

    process.exit(summary.failed > 0 ? 1 : 0);
  });
