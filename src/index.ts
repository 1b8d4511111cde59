#!/usr/bin/env node
/**
 * log-analyzer – CLI
 * Commands: analyze | demo
 */

import { program } from "commander";
import { resolve } from "node:path";
import { MalformedLinePolicy } from "./core/domain/entities/log-entry.entity.js";
import { IConfigService } from "./core/domain/services/IConfigService.js";
import { AnalyzeLogUseCase } from "./core/use-cases/analyze-log.use-case.js";
import { GenerateSampleLogUseCase } from "./core/use-cases/generate-sample-log.use-case.js";
import { renderAnalysisReport } from "./adapters/presenters/analysis-report.presenter.js";
import { WindowMinutesSchema } from "./adapters/validation.js";
import { FileLineRepository } from "./infrastructure/repositories/file-line.repository.js";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { resolveNow } from "./infrastructure/utils/clock.utils.js";
import { runId } from "./infrastructure/utils/id.utils.js";
import { withWorkspace } from "./infrastructure/utils/workspace.utils.js";

const MINUTE_MS = 60_000;

interface AnalyzeOptions {
  windowMinutes?: string;
  level?: string;
  /** A path, or false for --no-export. */
  export?: string | boolean;
  skipMalformed?: boolean;
  now?: string;
}

interface GlobalOptions {
  config?: string;
}

interface DemoOptions {
  keep?: boolean;
}

// ─── Shared helpers ───────────────────────────────────────────────────────────

function createLogger(config: IConfigService): JsonLogger {
  const { dir, fileName } = config.getLoggingConfig();
  const logger = new JsonLogger(resolve(dir), fileName);
  logger.init(runId());
  return logger;
}

function parseWindowMinutes(raw: string | undefined, config: IConfigService): number {
  if (raw === undefined) return config.getAnalysisConfig().recentWindowMinutes;
  const parsed = WindowMinutesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(parsed.error.issues[0]?.message ?? "Invalid --window-minutes");
  }
  return parsed.data;
}

function exportTargetFor(opts: AnalyzeOptions, config: IConfigService): string | undefined {
  if (opts.export === false) return undefined;
  if (typeof opts.export === "string") return resolve(opts.export);
  const { outputDir, fileName } = config.getExportConfig();
  return resolve(outputDir, fileName);
}

// ─── CLI ──────────────────────────────────────────────────────────────────────

program
  .name("log-analyzer")
  .description("Parse, filter and export `<timestamp> [<level>] <message>` log files")
  .option(
    "-c, --config <path>",
    "Config file path (default: $CONFIG_PATH or ./config/config.yaml)",
  );

program
  .command("analyze")
  .description("Count entries by level, list recent errors and export a filtered subset")
  .argument("<file>", "Log file to analyze")
  .option("--window-minutes <n>", "Recent-error window in minutes")
  .option("--level <level>", "Level of the entries to export")
  .option("--export <path>", "Write the exported lines to this file")
  .option("--no-export", "Do not write an export file")
  .option("--skip-malformed", "Skip malformed lines instead of aborting")
  .option("--now <timestamp>", "Reference time as YYYY-MM-DD HH:MM:SS (default: local clock)")
  .action(async (file: string, opts: AnalyzeOptions) => {
    let logger: JsonLogger | undefined;
    try {
      const config: IConfigService = new ConfigService(program.opts<GlobalOptions>().config);
      logger = createLogger(config);

      const windowMinutes = parseWindowMinutes(opts.windowMinutes, config);
      const onMalformed: MalformedLinePolicy = opts.skipMalformed
        ? "skip"
        : config.getAnalysisConfig().onMalformed;
      const repo = new FileLineRepository();

      const report = await new AnalyzeLogUseCase(repo, repo, logger).execute({
        source: resolve(file),
        exportTarget: exportTargetFor(opts, config),
        now: resolveNow(opts.now),
        windowMs: windowMinutes * MINUTE_MS,
        exportLevel: opts.level ?? config.getExportConfig().level,
        onMalformed,
      });

      for (const line of renderAnalysisReport(report, windowMinutes)) {
        console.log(line);
      }
    } catch (e) {
      console.error("Analysis failed:", e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    } finally {
      await logger?.close();
    }
  });

program
  .command("demo")
  .description("Generate a sample log in a scratch directory, analyze it and clean up")
  .option("--keep", "Leave the scratch directory in place")
  .action(async (opts: DemoOptions) => {
    let logger: JsonLogger | undefined;
    try {
      const config: IConfigService = new ConfigService(program.opts<GlobalOptions>().config);
      const activeLogger = createLogger(config);
      logger = activeLogger;

      const { recentWindowMinutes: windowMinutes, onMalformed } = config.getAnalysisConfig();
      const exportConfig = config.getExportConfig();
      const { workDir } = config.getDemoConfig();
      const repo = new FileLineRepository();
      const now = resolveNow();

      await withWorkspace(
        workDir,
        activeLogger,
        async (workspace) => {
          const logFile = workspace.path("application.log");
          const entries = await new GenerateSampleLogUseCase(repo).execute({
            target: logFile,
            now,
          });
          console.log(`Created log file with ${entries.length} entries: ${logFile}\n`);

          const report = await new AnalyzeLogUseCase(repo, repo, activeLogger).execute({
            source: logFile,
            exportTarget: workspace.path(exportConfig.fileName),
            now,
            windowMs: windowMinutes * MINUTE_MS,
            exportLevel: exportConfig.level,
            onMalformed,
          });

          for (const line of renderAnalysisReport(report, windowMinutes)) {
            console.log(line);
          }
        },
        { keep: opts.keep },
      );

      console.log(
        opts.keep
          ? `\nWorkspace kept at ${resolve(workDir)}`
          : "\nCleaned up temporary files",
      );
    } catch (e) {
      console.error("Demo failed:", e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    } finally {
      await logger?.close();
    }
  });

await program.parseAsync(process.argv);
