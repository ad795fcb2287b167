import * as os from 'os';
import { ExternalToolFailure } from '../lib/errors';
import { ToolInvoker } from '../lib/tool-invoker';

const NODE = process.execPath;

test('captures stdout, stderr and exit code', async () => {
  const tools = new ToolInvoker();

  const result = await tools.run(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exitCode = 3']);

  expect(result.exitCode).toEqual(3);
  expect(result.stdout).toEqual('out');
  expect(result.stderr).toEqual('err');
  expect(result.output).toContain('out');
  expect(result.output).toContain('err');
  expect(result.output).toHaveLength(6);
  expect(result.signal).toBeUndefined();
  expect(result.durationMs).toBeGreaterThanOrEqual(0);
});

test('non-zero exit does not throw by default', async () => {
  const tools = new ToolInvoker();

  await expect(tools.run(NODE, ['-e', 'process.exit(1)'])).resolves.toMatchObject({ exitCode: 1 });
});

test('strict mode throws on non-zero exit', async () => {
  const tools = new ToolInvoker();

  let caught: unknown;
  try {
    await tools.run(NODE, ['-e', 'console.log("nope"); process.exit(2)'], { strict: true });
  } catch (e) {
    caught = e;
  }

  expect(caught).toBeInstanceOf(ExternalToolFailure);
  expect(caught instanceof ExternalToolFailure && caught.result.exitCode).toEqual(2);
  expect(caught instanceof ExternalToolFailure && caught.result.stdout).toEqual('nope\n');
});

test('strict mode passes on zero exit', async () => {
  const tools = new ToolInvoker();

  const result = await tools.run(NODE, ['-e', 'console.log("fine")'], { strict: true });

  expect(result.exitCode).toEqual(0);
  expect(result.stdout).toEqual('fine\n');
});

test('result is frozen', async () => {
  const tools = new ToolInvoker();

  const result = await tools.run(NODE, ['-e', '']);

  expect(Object.isFrozen(result)).toBe(true);
  expect(Object.isFrozen(result.args)).toBe(true);
});

test('command that does not exist reports 127', async () => {
  const tools = new ToolInvoker();

  const result = await tools.run('rig-test-no-such-command', ['--version']);

  expect(result.exitCode).toEqual(127);
  expect(result.stderr).toContain('ENOENT');
  expect(tools.activeCount).toEqual(0);
});

test('passes environment, working directory and input', async () => {
  const tools = new ToolInvoker({ env: { RIG_TEST_DEFAULT: 'from-defaults' } });
  const script = [
    'let input = "";',
    'process.stdin.on("data", d => { input += d; });',
    'process.stdin.on("end", () => {',
    '  process.stdout.write([process.env.RIG_TEST_DEFAULT, process.env.RIG_TEST_VALUE, process.cwd(), input].join("|"));',
    '});',
  ].join('\n');

  const result = await tools.run(NODE, ['-e', script], {
    cwd: os.tmpdir(),
    env: { RIG_TEST_VALUE: 'test-value' },
    input: 'hello',
  });

  expect(result.cwd).toEqual(os.tmpdir());
  const [fromDefaults, value, cwd, input] = result.stdout.split('|');
  expect(fromDefaults).toEqual('from-defaults');
  expect(value).toEqual('test-value');
  expect(cwd.length).toBeGreaterThan(0);
  expect(input).toEqual('hello');
});

test('cancelAll forwards a signal to running processes', async () => {
  const tools = new ToolInvoker();

  const running = tools.run(NODE, ['-e', 'setTimeout(() => {}, 30000)']);
  expect(tools.activeCount).toEqual(1);
  tools.cancelAll('SIGTERM');
  const result = await running;

  expect(result.signal).toEqual('SIGTERM');
  expect(result.exitCode).toEqual(128 + os.constants.signals.SIGTERM);
  expect(tools.activeCount).toEqual(0);
});

test('abort signal stops the process', async () => {
  const tools = new ToolInvoker();
  const controller = new AbortController();

  const running = tools.run(NODE, ['-e', 'setTimeout(() => {}, 30000)'], { signal: controller.signal });
  controller.abort();
  const result = await running;

  expect(result.exitCode).toBeGreaterThan(128);
  expect(result.signal).toBeDefined();
});
