/**
 * REASON CLI
 *
 * Commands:
 *   reason analyze --disease <name> [--data-sources <s...>] [--analysis-level <level>]
 *                  [--simulate] [--treatment <id>] [--validate] [--output <dir>] [--fast] [--stats]
 *   reason dataset show <dataType> [name] [--no-cache]
 *   reason knowledge disease|pathway|drug <id>
 *   reason knowledge literature <query> [--max 10]
 *   reason config show|validate|reset
 *
 * `-c, --config <path>` selects the configuration file for every command.
 * `analyze` logs to ./reason_log_<YYYYMMDD-HHMMSS>.log unless `logFile` is set.
 */

import path from 'path';
import { Command, Option } from 'commander';
import { ANALYSIS_LEVELS, ConfigManager } from '../config/index.js';
import type { ReasonConfig } from '../config/index.js';
import { KnowledgeStore } from '../knowledge/index.js';
import { Logger } from '../logging/index.js';
import { AnalysisPipeline, logFileNameFor } from '../pipeline/index.js';
import type { StageEvent } from '../pipeline/index.js';
import { DatasetStore, isErrorDocument } from '../storage/index.js';
import { OutputFormatter } from './formatter.js';

export const VERSION = '0.1.0';

interface Spinner {
  stop: (ok: boolean, text?: string) => void;
}

type SpinnerFactory = (text: string) => Spinner;

// Spinner factory (ora is imported lazily).
async function loadSpinnerFactory(): Promise<SpinnerFactory> {
  try {
    const { default: ora } = await import('ora');
    return (text) => {
      const s = ora(text).start();
      return {
        stop: (ok, doneText) => {
          if (ok) s.succeed(doneText);
          else s.fail(doneText);
        },
      };
    };
  } catch {
    // Fallback for environments without ora
    return (text) => {
      process.stdout.write(`${text}...\n`);
      return { stop: () => {} };
    };
  }
}

interface AnalyzeOpts {
  disease: string;
  dataSources?: string[];
  analysisLevel?: string;
  simulate?: boolean;
  treatment?: string;
  validate?: boolean;
  output?: string;
  fast?: boolean;
  stats?: boolean;
}

export class ReasonCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  get command(): Command {
    return this.program;
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('reason')
      .version(VERSION, '-V, --version', 'Print version')
      .description('REASON: Rational Empirical Analysis and Scientific Observation Network')
      .option('-c, --config <path>', 'Path to configuration file');

    // ── analyze ────────────────────────────────────────────────────────────
    program
      .command('analyze')
      .description('Analyze a disease and write result artifacts')
      .requiredOption('-d, --disease <name>', 'Name of the disease to analyze')
      .option('--data-sources <sources...>', 'Data types to load for the disease')
      .addOption(
        new Option('--analysis-level <level>', 'Level of analysis to perform').choices([...ANALYSIS_LEVELS])
      )
      .option('--simulate', 'Run a systems biology simulation')
      .option('--treatment <id>', 'Treatment ID for simulation')
      .option('--validate', 'Validate results against known data')
      .option('-o, --output <dir>', 'Output directory for results')
      .option('--fast', 'Skip simulated stage delays')
      .option('--stats', 'Print cache statistics after the run')
      .action(async (opts: AnalyzeOpts) => {
        let pipeline: AnalysisPipeline | undefined;
        const disease = opts.disease.trim();
        try {
          const config = this.loadConfig();
          if (opts.output) config.resultsDir = opts.output;
          if (opts.fast) config.stageDelayScale = 0;
          if (!config.logFile) config.logFile = path.join(process.cwd(), logFileNameFor(new Date()));

          const makeSpinner = await loadSpinnerFactory();
          let current: Spinner | undefined;
          const onStage = (event: StageEvent): void => {
            if (event.phase === 'start') {
              current = makeSpinner(event.message);
            } else {
              current?.stop(true);
              current = undefined;
            }
          };

          pipeline = this.createPipeline(config, onStage);
          try {
            const run = await pipeline.run(disease, {
              dataSources: opts.dataSources,
              analysisLevel: opts.analysisLevel,
              simulate: opts.simulate,
              treatment: opts.treatment,
              validate: opts.validate,
            });
            console.log(this.formatter.formatAnalysisRun(run));
          } catch (err) {
            current?.stop(false, 'Analysis failed');
            throw err;
          }

          if (opts.stats) {
            console.log(this.formatter.formatCacheStats('Dataset', pipeline.datasets.getCacheStats()));
            console.log(this.formatter.formatCacheStats('Knowledge', pipeline.knowledge.getCacheStats()));
          }

          console.log(`\nAnalysis of ${disease} completed successfully.`);
          console.log(`Results saved to ${config.resultsDir}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        } finally {
          pipeline?.shutdown();
        }
      });

    program.addCommand(this.datasetCommand());
    program.addCommand(this.knowledgeCommand());
    program.addCommand(this.configCommand());

    return program;
  }

  // ── dataset ──────────────────────────────────────────────────────────────

  private datasetCommand(): Command {
    const cmd = new Command('dataset').description('Inspect stored datasets');

    cmd
      .command('show <dataType> [name]')
      .description('Load a dataset, falling back to placeholder data')
      .option('--no-cache', 'Read from disk even when the document is cached')
      .action((dataType: string, name: string | undefined, opts: { cache: boolean }) => {
        try {
          const config = this.loadConfig();
          const store = new DatasetStore({ dataDir: config.dataDir, logger: this.logger(config, 'DatasetStore') });
          const doc = store.load(dataType, name, opts.cache && config.cacheEnabled);
          if (isErrorDocument(doc)) {
            console.error(this.formatter.formatError(new Error(doc.error)));
            process.exitCode = 1;
          } else {
            console.log(this.formatter.formatDocument(store.resolvePath(dataType, name), doc));
          }
          store.shutdown();
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return cmd;
  }

  // ── knowledge ────────────────────────────────────────────────────────────

  private knowledgeCommand(): Command {
    const cmd = new Command('knowledge').description('Query the knowledge store');

    const lookup = (kind: 'disease' | 'pathway' | 'drug', description: string) =>
      cmd
        .command(`${kind} <id>`)
        .description(description)
        .action((id: string) => {
          this.withKnowledge((kb) => {
            const record =
              kind === 'disease' ? kb.getDisease(id) : kind === 'pathway' ? kb.getPathway(id) : kb.getDrug(id);
            console.log(this.formatter.formatDocument(`${kind} ${id}`, record));
          });
        });

    lookup('disease', 'Show disease information');
    lookup('pathway', 'Show a biological pathway');
    lookup('drug', 'Show drug information');

    cmd
      .command('literature <query>')
      .description('Search the literature')
      .option('-m, --max <n>', 'Maximum number of results', '10')
      .action((query: string, opts: { max: string }) => {
        this.withKnowledge((kb) => {
          console.log(this.formatter.formatPublications(query, kb.searchLiterature(query, parseInt(opts.max, 10))));
        });
      });

    return cmd;
  }

  // ── config ───────────────────────────────────────────────────────────────

  private configCommand(): Command {
    const cmd = new Command('config').description('Manage REASON configuration');

    cmd
      .command('show')
      .description('Print the effective configuration')
      .action(() => {
        try {
          console.log(JSON.stringify(this.loadConfig(), null, 2));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    cmd
      .command('validate')
      .description('Validate the current configuration')
      .action(() => {
        try {
          const manager = this.activeConfigManager();
          const { valid, errors } = manager.validate(manager.loadWithEnvOverrides());
          if (valid) {
            console.log('✅ Configuration is valid');
          } else {
            console.error('❌ Configuration has errors:');
            for (const err of errors) {
              console.error(`  - ${err}`);
            }
            process.exitCode = 1;
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    cmd
      .command('reset')
      .description('Write the default configuration')
      .action(() => {
        try {
          const manager = this.activeConfigManager();
          manager.save(ConfigManager.defaults());
          console.log(`✅ Configuration reset to defaults (${manager.configPath})`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return cmd;
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected createPipeline(config: ReasonConfig, onStage: (event: StageEvent) => void): AnalysisPipeline {
    return new AnalysisPipeline(config, { onStage });
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private activeConfigManager(): ConfigManager {
    const { config } = this.program.opts<{ config?: string }>();
    return config ? new ConfigManager(config) : this.configManager;
  }

  /** Effective configuration; an unreadable config file falls back to the defaults. */
  private loadConfig(): ReasonConfig {
    return this.activeConfigManager().loadWithFallback();
  }

  private logger(config: ReasonConfig, component: string): Logger {
    return new Logger(`REASON.${component}`, { level: config.logLevel, logFile: config.logFile });
  }

  private withKnowledge(fn: (kb: KnowledgeStore) => void): void {
    try {
      const config = this.loadConfig();
      const kb = new KnowledgeStore({ dataDir: config.dataDir, logger: this.logger(config, 'KnowledgeStore') });
      try {
        fn(kb);
      } finally {
        kb.shutdown();
      }
    } catch (err) {
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }
}
