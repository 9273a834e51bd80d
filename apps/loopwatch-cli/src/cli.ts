#!/usr/bin/env tsx
/**
 * loopwatch CLI
 *
 * Commands:
 *   loopwatch run                 — run scenarios while sampling the GPU, classify, save
 *   loopwatch analyze             — re-classify and evaluate saved runs
 *   loopwatch config show         — resolved settings and where the file lives
 *   loopwatch config set <k> <v>  — persist one setting
 *   loopwatch config reset        — forget persisted settings
 *
 * Exit codes:
 *   0  every run completed or timed out and was classified
 *   1  at least one run FAILED (agent error before any telemetry)
 *   2  configuration or persistence failure
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import inquirer from 'inquirer'
import {
  analyzeResults,
  bootstrapHarness,
  buildAnalyzer,
  envName,
  HarnessConfigError,
  parseLayer,
  protocolFrom,
  resolveSettings,
  runExperiment,
  SETTING_KEYS,
  type SettingKey,
  type StoredSettings,
} from '@loopwatch/harness-core'
import {
  FileRunStore,
  MemoryRunStore,
  PersistenceError,
  RunFileFormatError,
} from '@loopwatch/run-store'
import { config } from './config'
import {
  EXIT,
  SCENARIO_CHOICES,
  err,
  fmtMs,
  fmtStatus,
  fmtVerdict,
  ok,
  parseScenarioChoice,
  printReport,
  summaryRows,
  table,
  warn,
} from './helpers'

const program = new Command()
const $ = chalk

function fatal(e: unknown): never {
  if (e instanceof HarnessConfigError) {
    err(e.message)
  } else if (e instanceof PersistenceError || e instanceof RunFileFormatError) {
    err(e.message)
    err('Results were not fully saved.')
  } else {
    err(e instanceof Error ? e.message : String(e))
  }
  process.exit(EXIT.FATAL)
}

function flagLayer(flags: Partial<Record<SettingKey, string>>): StoredSettings {
  return parseLayer(key => flags[key], 'flags')
}

async function promptScenario(): Promise<string> {
  if (!process.stdin.isTTY) return 'all'
  const { scenario } = await inquirer.prompt<{ scenario: string }>([
    {
      type:    'list',
      name:    'scenario',
      message: 'Which scenario?',
      choices: [...SCENARIO_CHOICES],
      default: 'all',
    },
  ])
  return scenario
}

// ─── Program ──────────────────────────────────────────────────────────────────

program
  .name('loopwatch')
  .description('Capture GPU telemetry while an agent runs, and flag infinite loops and retry storms')
  .version('0.1.0')

// ─── Run ──────────────────────────────────────────────────────────────────────

interface RunFlags {
  scenario?: string
  runs?: string
  interval?: string
  timeout?: string
  resultsDir?: string
  simulate?: boolean
  agentUrl?: string
  gpuIndex?: string
  dryRun?: boolean
  verbose?: boolean
}

program
  .command('run')
  .description('Run scenarios under GPU sampling, classify each run and save it')
  .option('-s, --scenario <name>',  `Scenario: ${SCENARIO_CHOICES.join(' | ')}`)
  .option('-n, --runs <count>',     'Runs per scenario')
  .option('--interval <ms>',        'Sampling interval in ms')
  .option('--timeout <ms>',         'Hard timeout per run in ms')
  .option('--results-dir <dir>',    'Where run files are written')
  .option('--simulate',             'Use the in-process agent and simulated GPU')
  .option('--agent-url <url>',      'Host the agent servers listen on (ports 8001-8003)')
  .option('--gpu-index <n>',        'GPU index passed to nvidia-smi')
  .option('--dry-run',              'Keep results in memory instead of writing files')
  .option('-v, --verbose',          'Log every lifecycle event')
  .action(async (opts: RunFlags) => {
    try {
      const choice    = opts.scenario ?? await promptScenario()
      const scenarios = parseScenarioChoice(choice)
      if (!scenarios) {
        throw new HarnessConfigError(`Unknown scenario "${choice}". Choose one of: ${SCENARIO_CHOICES.join(', ')}`)
      }

      const settings = resolveSettings(config.stored, process.env, flagLayer({
        runs_per_scenario:  opts.runs,
        sample_interval_ms: opts.interval,
        timeout_ms:         opts.timeout,
        results_dir:        opts.resultsDir,
        simulate:           opts.simulate ? 'true' : undefined,
        agent_host:         opts.agentUrl,
        gpu_index:          opts.gpuIndex,
      }))

      const harness = bootstrapHarness(settings, {
        run_log: opts.verbose ?? false,
        store:   opts.dryRun ? new MemoryRunStore() : undefined,
      })

      const spinner = ora()
      const result = await runExperiment(
        harness,
        { scenarios, runs_per_scenario: settings.runs_per_scenario },
        {
          onRunStart: (scenario, i, n) => {
            spinner.start(`Run ${i}/${n}: ${scenario}…`)
          },
          onRunEnd: ({ record, detection }, i, n) => {
            const head = `Run ${i}/${n}: ${record.scenario} ${fmtStatus(record.status)} in ` +
                         `${fmtMs(record.duration_ms)}, ${record.samples.length} sample(s)`
            if (!detection) {
              spinner.fail(`${head} — ${record.outcome.error_message ?? 'agent failed'}`)
            } else if (detection.correct) {
              spinner.succeed(`${head} → ${detection.predicted} (${fmtVerdict(detection.verdict)})`)
            } else {
              spinner.warn(`${head} → ${detection.predicted} (${fmtVerdict(detection.verdict)})`)
            }
          },
        }
      ).catch((e: unknown) => {
        spinner.stop()
        throw e
      })
      harness.shutdown()

      console.log()
      table(summaryRows(result.summary))
      printReport(result.report)

      if (opts.dryRun) warn('Dry run: nothing was written')
      else ok(`Results saved to ${$.bold(settings.results_dir)}`)

      if (result.failed_runs > 0) {
        err(`${result.failed_runs} run(s) failed before any telemetry was captured`)
        process.exitCode = EXIT.RUN_FAILED
      }
    } catch (e) {
      fatal(e)
    }
  })

// ─── Analyze ──────────────────────────────────────────────────────────────────

interface AnalyzeFlags {
  resultsDir?: string
  mode?: string
  accuracyTarget?: string
  latencyTarget?: string
}

program
  .command('analyze')
  .description('Re-classify saved runs and evaluate accuracy and detection latency')
  .option('--results-dir <dir>',      'Directory of saved runs')
  .option('--mode <mode>',            'Evaluation protocol: pooled | per_scenario')
  .option('--accuracy-target <f>',    'Required accuracy, 0..1')
  .option('--latency-target <ms>',    'Required max detection latency in ms')
  .action(async (opts: AnalyzeFlags) => {
    const spinner = ora('Loading saved runs…').start()
    try {
      const settings = resolveSettings(config.stored, process.env, flagLayer({
        results_dir:       opts.resultsDir,
        evaluation_mode:   opts.mode,
        accuracy_target:   opts.accuracyTarget,
        latency_target_ms: opts.latencyTarget,
      }))

      const { detections, report, summary, skipped_failed } = await analyzeResults(
        new FileRunStore(settings.results_dir),
        buildAnalyzer(settings),
        protocolFrom(settings)
      )
      spinner.stop()

      if (detections.length === 0) {
        warn(`No classifiable runs in ${settings.results_dir}`)
        return
      }

      table([
        ['Run', 'Scenario', 'Predicted', 'Verdict', 'Score', 'Latency'],
        ...detections.map(d => [
          d.run_id.slice(0, 8) + '…',
          d.scenario,
          d.predicted,
          fmtVerdict(d.verdict),
          d.score.toFixed(2),
          fmtMs(d.detection_latency_ms),
        ]),
      ])
      console.log()
      table(summaryRows(summary))
      printReport(report)

      if (skipped_failed > 0) warn(`${skipped_failed} FAILED run(s) skipped`)
    } catch (e) {
      spinner.stop()
      fatal(e)
    }
  })

// ─── Config ───────────────────────────────────────────────────────────────────

const cfg = program.command('config').description('Manage persisted settings')

cfg
  .command('show')
  .description('Show resolved settings')
  .action(() => {
    try {
      const stored   = config.stored
      const settings = resolveSettings(stored, process.env)

      console.log()
      console.log(`  ${$.bold('File')}  ${config.path}`)
      console.log()
      table([
        ['Setting', 'Value', 'Source'],
        ...SETTING_KEYS.map(key => [
          key,
          String(settings[key]),
          process.env[envName(key)] !== undefined ? $.cyan('env')
            : stored[key] !== undefined ? $.green('config')
            : $.gray('default'),
        ]),
      ])
      console.log()
      console.log(`  Agent API key: ${settings.agent_api_key ? $.green('set') : $.gray('not set')} ` +
                  `(${envName('agent_api_key')})`)
      console.log()
    } catch (e) {
      fatal(e)
    }
  })

cfg
  .command('set <key> <value>')
  .description('Persist one setting')
  .action((key: string, value: string) => {
    try {
      config.set(key, value)
      ok(`${key} set to ${value}`)
    } catch (e) {
      fatal(e)
    }
  })

cfg
  .command('reset')
  .description('Forget all persisted settings')
  .action(() => {
    config.reset()
    ok('Settings reset to defaults')
  })

// ─── Parse ────────────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch(fatal)
