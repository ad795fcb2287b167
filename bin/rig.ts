#!/usr/bin/env node
import { cli, printFailure } from '../lib/commands/cli';
import { ToolInvoker } from '../lib/tool-invoker';
import * as log from '../lib/util/log';

const tools = new ToolInvoker();
const interrupt = new AbortController();

// First Ctrl-C: pass it on to the running tool and don't start anything new.
// A second one gets Node's default handling.
process.once('SIGINT', () => {
  log.warning('Interrupted; waiting for running tools to stop');
  tools.cancelAll('SIGINT');
  interrupt.abort();
});

async function main() {
  log.markStartTime();
  await cli(process.argv.slice(2), { tools, signal: interrupt.signal });
}

main().catch(e => {
  printFailure(e);
  process.exitCode = interrupt.signal.aborted ? 130 : 1;
});
