import * as child_process from 'child_process';
import * as os from 'os';
import * as log from './util/log';
import { Timer } from './util/timer';
import { commandLine, ExternalToolFailure } from './errors';

/**
 * What came out of one external command
 */
export interface ExternalProcessResult {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;

  /**
   * Exit code of the process
   *
   * 127 if the command could not be started, 128 + the signal number
   * if the process was killed by a signal.
   */
  readonly exitCode: number;
  readonly signal?: NodeJS.Signals;
  readonly stdout: string;
  readonly stderr: string;

  /**
   * stdout and stderr, interleaved in the order they arrived
   */
  readonly output: string;
  readonly durationMs: number;
}

export interface InvokeOptions {
  readonly cwd?: string;

  /**
   * Variables added to (and overriding) the parent environment
   */
  readonly env?: Record<string, string>;

  /**
   * Throw ExternalToolFailure on a non-zero exit code
   *
   * @default false
   */
  readonly strict?: boolean;

  /**
   * Text written to the process's stdin
   */
  readonly input?: string;

  /**
   * Stream the output to our own stdout/stderr as it is captured
   *
   * @default false
   */
  readonly echo?: boolean;

  readonly signal?: AbortSignal;
}

export interface IToolInvoker {
  run(command: string, args: readonly string[], options?: InvokeOptions): Promise<ExternalProcessResult>;
}

export interface ToolInvokerOptions {
  readonly cwd?: string;
  readonly env?: Record<string, string>;
}

/**
 * Runs external tools and captures what they did
 */
export class ToolInvoker implements IToolInvoker {
  private readonly active = new Set<child_process.ChildProcess>();

  constructor(private readonly defaults: ToolInvokerOptions = {}) {
  }

  /**
   * Number of processes that have been started and not yet exited
   */
  public get activeCount() {
    return this.active.size;
  }

  public async run(command: string, args: readonly string[], options: InvokeOptions = {}): Promise<ExternalProcessResult> {
    const result = await this.spawn(command, args, options);
    log.debug(`${command} exited with ${result.exitCode} (${result.durationMs}ms)`);
    if (!options.echo) {
      log.traceOutput(result.output);
    }

    if (options.strict && result.exitCode !== 0) {
      throw new ExternalToolFailure(result);
    }
    return result;
  }

  /**
   * Forward a signal to every process that is still running
   */
  public cancelAll(signal: NodeJS.Signals = 'SIGINT') {
    for (const child of this.active) {
      log.debug(`Sending ${signal} to ${child.spawnfile} (pid ${child.pid})`);
      child.kill(signal);
    }
  }

  private spawn(command: string, args: readonly string[], options: InvokeOptions): Promise<ExternalProcessResult> {
    const cwd = options.cwd ?? this.defaults.cwd ?? process.cwd();
    log.debug(`[${cwd}] ${commandLine({ command, args })}`);
    const overrides = Object.keys(options.env ?? {});
    if (overrides.length > 0) {
      log.trace(`  with ${overrides.join(', ')} set`);
    }

    const timer = new Timer(command);
    const stdout = new Array<Buffer>();
    const stderr = new Array<Buffer>();
    const output = new Array<Buffer>();

    return new Promise((ok) => {
      const child = child_process.spawn(command, [...args], {
        cwd,
        env: { ...process.env, ...this.defaults.env, ...options.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        // Own process group: a terminal Ctrl-C reaches only us, and cancelAll() passes it on once
        detached: process.platform !== 'win32',
        signal: options.signal,
      });
      this.active.add(child);

      let settled = false;
      let spawnError: Error | undefined;

      const finish = (exitCode: number, signal: NodeJS.Signals | null) => {
        if (settled) { return; }
        settled = true;
        this.active.delete(child);

        const errText = Buffer.concat(stderr).toString('utf-8') + (spawnError ? `${spawnError.message}\n` : '');
        ok(Object.freeze({
          command,
          args: Object.freeze([...args]),
          cwd,
          exitCode,
          signal: signal ?? undefined,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: errText,
          output: Buffer.concat(output).toString('utf-8') + (spawnError ? `${spawnError.message}\n` : ''),
          durationMs: timer.stop(),
        }));
      };

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
        output.push(chunk);
        if (options.echo) { process.stdout.write(chunk); }
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
        output.push(chunk);
        if (options.echo) { process.stderr.write(chunk); }
      });

      child.on('error', (e) => {
        if (child.pid === undefined) {
          // Never started (not on the PATH, not executable, ...)
          spawnError = e;
          finish(127, null);
        } else {
          // Aborted: 'close' follows and carries the signal
          log.debug(`${command}: ${e.message}`);
        }
      });

      child.on('close', (code, signal) => {
        finish(code ?? (signal ? 128 + signalNumber(signal) : 1), signal);
      });

      if (child.stdin) {
        child.stdin.on('error', (e) => log.debug(`${command}: stdin: ${e.message}`));
        child.stdin.end(options.input);
      }
    });
  }
}

function signalNumber(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry?.[1] ?? 0;
}
