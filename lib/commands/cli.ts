import yargs from 'yargs';
import * as log from '../util/log';
import { SimpleError } from '../util/flow';
import { commandLine, ExternalToolFailure, ServiceLifecycleError, TargetFailedError } from '../errors';
import { Project } from '../project';
import { IToolInvoker } from '../tool-invoker';
import { formatPlan, formatTargets } from './inspect';
import { run } from './run';
import { services, SERVICE_OPERATIONS } from './services';

export interface CliOptions {
  readonly tools: IToolInvoker;
  readonly signal?: AbortSignal;

  /**
   * Where to look for rig.json when --config is not given
   */
  readonly cwd?: string;
}

/**
 * Options that belong to 'rig run' itself; every other --name value is a parameter
 */
const RESERVED_OPTIONS = new Set(['_', '$0', 'target', 'config', 'c', 'verbose', 'v', 'report', 'dry-run', 'help', 'version']);

export async function cli(args: string[], options: CliOptions): Promise<void> {
  // Handlers record their failure here instead of throwing through yargs
  let failure: unknown;
  const guard = (fn: () => Promise<void>) => fn().catch((e: unknown) => { failure = e; });

  const loadProject = (config: string | undefined) => Project.load(config, options.cwd);

  await yargs(args)
    .scriptName('rig')
    .usage('$0 <cmd> [args]')
    .parserConfiguration({
      'camel-case-expansion': false,
      'dot-notation': false,
      'parse-numbers': false,
      'parse-positional-numbers': false,
    })
    .option('verbose', {
      alias: 'v',
      type: 'count',
      desc: 'Increase logging verbosity (-vv also shows every tool\'s output)',
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      desc: 'Config file (default: nearest rig.json up from the working directory)',
      requiresArg: true,
    })
    .middleware((argv) => { log.setVerbosity(argv.verbose); })
    .command('run <target>', 'Run a target and everything it depends on; any other --name value is a parameter',
      y => y
        .positional('target', { type: 'string', demandOption: true, desc: 'Target to run' })
        .option('report', { type: 'string', requiresArg: true, desc: 'Write a JSON report of the run to this file' })
        .option('dry-run', { type: 'boolean', default: false, desc: 'Print the plan without running it' }),
      argv => guard(async () => {
        const project = await loadProject(argv.config);
        await run(project, {
          target: argv.target,
          tools: options.tools,
          params: extractParams(argv),
          report: argv.report,
          dryRun: argv['dry-run'],
          signal: options.signal,
        });
      }))
    .command('plan <target>', 'Print the targets that would run, in order',
      y => y.positional('target', { type: 'string', demandOption: true }),
      argv => guard(async () => {
        const project = await loadProject(argv.config);
        process.stdout.write(formatPlan(project.graph.resolve(argv.target)) + '\n');
      }))
    .command('list', 'List all targets',
      y => y,
      argv => guard(async () => {
        const project = await loadProject(argv.config);
        process.stdout.write(formatTargets(project.graph.resolveAll()) + '\n');
      }))
    .command('graph', 'Print the target graph in GraphViz format',
      y => y,
      argv => guard(async () => {
        const project = await loadProject(argv.config);
        process.stdout.write(project.graph.toGraphViz() + '\n');
      }))
    .command('services <operation> [names..]', 'Show, start, stop or remove declared services',
      y => y
        .positional('operation', { choices: SERVICE_OPERATIONS, demandOption: true })
        .positional('names', { type: 'string', array: true, default: [] }),
      argv => guard(async () => {
        const project = await loadProject(argv.config);
        await services(project, options.tools, argv.operation, argv.names);
      }))
    .demandCommand(1, 'Specify a command')
    .strictCommands()
    .help()
    .showHelpOnFail(false)
    .fail((msg, err) => {
      throw err ?? new SimpleError(msg);
    })
    .parseAsync();

  if (failure !== undefined) {
    throw failure;
  }
}

/**
 * Turn the --name value options that are not our own into parameters
 *
 * A repeated option keeps its last value; a flag without a value is 'true'.
 */
export function extractParams(argv: Record<string, unknown>): Record<string, string> {
  const ret: Record<string, string> = {};
  for (const [key, value] of Object.entries(argv)) {
    if (RESERVED_OPTIONS.has(key)) { continue; }

    const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
    if (typeof last === 'string' || typeof last === 'number' || typeof last === 'boolean') {
      ret[key] = `${last}`;
    }
  }
  return ret;
}

/**
 * Print what went wrong; for a failed tool, also the command line and everything it printed
 */
export function printFailure(e: unknown) {
  const reason = e instanceof TargetFailedError ? e.reason : e;
  const result = reason instanceof ExternalToolFailure || reason instanceof ServiceLifecycleError ? reason.result : undefined;

  if (result !== undefined) {
    log.error(`Command: ${commandLine(result)}`);
    log.toolOutput(result.output.trim() !== '' ? result.output : '(no output)');
  }

  if (e instanceof SimpleError) {
    log.error(e.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
  }
}
