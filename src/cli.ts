#!/usr/bin/env node
import { parseArgs, USAGE, type CliCommand } from './args';
import { DEFAULT_SETTINGS_FILE, loadConfig, saveSettings } from './config';
import { describeError } from './errors';
import { runJob } from './job';
import { createLogger, log, setLogger } from './logger';
import { createToolRunner } from './pipeline/exec';
import { renderSummary } from './pipeline/summary';
import { OPERATION_TOOLS, probeTool } from './pipeline/tools';

function printUsage(): void {
  console.log(USAGE);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printUsage();
    return 1;
  }

  const parsed = parseArgs(args);
  if (parsed.kind === 'help') {
    printUsage();
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(`Error: ${parsed.error}`);
    return 1;
  }

  const { config, settings, settingsPath } = await loadConfig(
    parsed.command.configPath ?? DEFAULT_SETTINGS_FILE,
    {
      timeoutMs: parsed.command.timeoutMs,
      concurrency: parsed.command.concurrency,
      quality: parsed.command.quality,
    }
  );
  setLogger(createLogger({ level: config.logLevel, file: config.logFile }));

  const command: CliCommand = {
    ...parsed.command,
    input: parsed.command.input ?? settings.inputDir,
    output: parsed.command.output ?? settings.outputDir,
  };

  const run = createToolRunner(config.tools);
  const tool = OPERATION_TOOLS[command.operation];
  const probe = await probeTool(run, tool);
  if (!probe.available) {
    console.error(`Error: ${tool} not found (looked for "${config.tools[tool]}"). Install it or set its path.`);
    return 1;
  }
  console.log(`Using ${tool} ${probe.version}`);

  const outcome = await runJob(command, {
    run,
    config,
    onResult: (result, completed, total) => {
      const status = result.succeeded ? 'ok' : `FAILED: ${result.errorMessage}`;
      console.log(`[${completed}/${total}] ${result.task.sourcePath} ${status}`);
    },
  });

  if (command.saveSettings) {
    await saveSettings(settingsPath, {
      ...settings,
      inputDir: outcome.inputDir,
      outputDir: outcome.outputDir,
      quality: config.quality,
    });
    log.info({ settingsPath }, 'settings saved');
  }

  console.log('');
  for (const line of renderSummary(outcome.summary, outcome)) {
    console.log(line);
  }
  console.log(`  Report: ${outcome.summaryPath}`);

  if (outcome.summary.totalFiles === 0) {
    console.log('No PDF files found in the input directory.');
  }

  return command.strict && outcome.summary.failedCount > 0 ? 2 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.fatal({ err }, 'job aborted');
    console.error('Fatal error:', describeError(err));
    process.exitCode = 1;
  });
