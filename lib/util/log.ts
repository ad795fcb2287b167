import chalk = require('chalk');

/**
 * 0: progress and problems; 1 (-v): what we are doing and why; 2 (-vv): also
 * every tool's environment overrides and captured output
 */
let verbosity = 0;

let startTime = Date.now();

export function setVerbosity(level: number) {
  verbosity = level;
}

export function debug(s: string) {
  if (verbosity >= 1) {
    process.stderr.write(chalk.gray(`[${elapsedTime().padStart(6)}] ${s}`) + '\n');
  }
}

export function trace(s: string) {
  if (verbosity >= 2) {
    process.stderr.write(chalk.dim(`[${elapsedTime().padStart(6)}] ${s}`) + '\n');
  }
}

export function info(s: string) {
  process.stderr.write(chalk.blue(s) + '\n');
}

export function success(s: string) {
  process.stderr.write(chalk.green(s) + '\n');
}

export function warning(s: string) {
  process.stderr.write(chalk.yellow(s) + '\n');
}

export function error(s: string) {
  process.stderr.write(chalk.red(s) + '\n');
}

/**
 * Captured tool output, indented so it stands apart from our own messages
 */
export function toolOutput(s: string) {
  process.stderr.write(indentOutput(s).map(l => chalk.dim(l)).join('\n') + '\n');
}

/**
 * Tool output at -vv
 */
export function traceOutput(s: string) {
  if (verbosity >= 2 && s !== '') {
    toolOutput(s);
  }
}

export function markStartTime() {
  startTime = Date.now();
}

function indentOutput(s: string) {
  return s.replace(/\n$/, '').split('\n').map(l => `  | ${l}`);
}

function elapsedTime() {
  return ((Date.now() - startTime) / 1000.0).toFixed(1);
}
