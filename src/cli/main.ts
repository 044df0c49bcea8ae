#!/usr/bin/env node

import path from "path";
import { Command } from "commander";
import { checkOnce, loadSource, runOnce, type RunOptions } from "../core/runner";
import { watchBrinefile } from "../core/watcher";
import { initBrinefile } from "../core/init-brinefile";
import { formatBrinefile } from "../ast";
import { BrineError } from "../util/errors";
import { writeFileAtomicSync } from "../util/fs-utils";
import { defaultLogger, type Logger } from "../util/logger";

interface BaseCliOptions {
  file?: string;
  config?: string;
  watch?: boolean;
  format?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

interface FmtCliOptions {
  check?: boolean;
}

interface InitCliOptions {
  element?: boolean;
  name?: string;
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function toRunOptions(cwd: string, baseOpts: BaseCliOptions, logger: Logger): RunOptions {
  return {
    sourceFile: baseOpts.file ? path.resolve(cwd, baseOpts.file) : undefined,
    configPath: baseOpts.config ? path.resolve(cwd, baseOpts.config) : undefined,
    format: baseOpts.format,
    logger,
  };
}

async function handleRunCommand(cwd: string, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const runnerOptions = toRunOptions(cwd, baseOpts, logger);

  logger.debug(
    `Starting brine (cwd=${cwd}, file=${runnerOptions.sourceFile ?? "auto"}, config=${runnerOptions.configPath ?? "auto"}, watch=${baseOpts.watch ? "yes" : "no"})`,
  );

  if (baseOpts.watch) {
    // Watch mode: keeps the process alive until interrupted
    await watchBrinefile(cwd, runnerOptions);
  } else {
    await runOnce(cwd, runnerOptions);
  }
}

async function handleCheckCommand(cwd: string, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  await checkOnce(cwd, toRunOptions(cwd, baseOpts, logger));
}

async function handleFmtCommand(cwd: string, fmtOpts: FmtCliOptions, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const { sourcePath, text } = await loadSource(cwd, toRunOptions(cwd, baseOpts, logger));

  const result = formatBrinefile(text);
  const name = path.basename(sourcePath);

  if (!result.changed) {
    logger.info(`${name} is already formatted.`);
    return;
  }

  if (fmtOpts.check) {
    logger.warn(`${name} is not formatted. Run "brine fmt" to fix it.`);
    process.exitCode = 1;
    return;
  }

  writeFileAtomicSync(sourcePath, result.text);
  logger.info(`Formatted ${sourcePath}`);
}

async function handleInitCommand(cwd: string, initOpts: InitCliOptions, baseOpts: BaseCliOptions) {
  createCliLogger(baseOpts);

  await initBrinefile(cwd, {
    element: initOpts.element,
    name: initOpts.name,
    force: initOpts.force,
    configPath: baseOpts.config ? path.resolve(cwd, baseOpts.config) : undefined,
  });
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("brine")
    .description("brine – compile a Brinefile into a Salt state")
    // global-ish options used by base + check + fmt + init
    .option("-f, --file <path>", "Path to the Brinefile (default: ./Brinefile)")
    .option("-c, --config <path>", "Path to brine config file")
    .option("-w, --watch", "Watch the Brinefile and regenerate on change")
    .option("--format", "Format the Brinefile after a successful compile")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  // check subcommand
  program
    .command("check")
    .description("Parse and validate the Brinefile without writing anything")
    .action(async (_opts: unknown, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleCheckCommand(cwd, baseOpts);
    });

  // fmt subcommand
  program
    .command("fmt")
    .description("Rewrite the Brinefile in canonical form")
    .option("--check", "Exit with status 1 instead of rewriting when the file is not formatted")
    .action(async (fmtOpts: FmtCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleFmtCommand(cwd, fmtOpts, baseOpts);
    });

  // init subcommand
  program
    .command("init")
    .description("Create a starter Brinefile")
    .option("--element", "Declare an %elementname instead of a %rolename")
    .option("--name <name>", "Dotted state name (default: directory name)")
    .option("--force", "Overwrite an existing Brinefile")
    .action(async (initOpts: InitCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleInitCommand(cwd, initOpts, baseOpts);
    });

  // Base command: compile once or in watch mode
  program.action(async (opts: BaseCliOptions) => {
    await handleRunCommand(cwd, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err: unknown) => {
  if (err instanceof BrineError) {
    console.error(err.toCliOutput());
  } else {
    defaultLogger.error(err);
  }
  process.exit(1);
});
