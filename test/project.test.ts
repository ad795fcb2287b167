import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../lib/errors';
import { Project } from '../lib/project';
import { FakeTools } from './fake-tools';

const RIG_JSON = {
  runtime: 'docker',
  params: { environment: 'dev', replicas: 2 },
  services: {
    db: { image: 'postgres:16', ports: ['5432:5432'], env: { POSTGRES_PASSWORD: 'test-secret' } },
    cache: { containerName: 'rig-cache', image: 'redis:7', ports: [6379] },
  },
  targets: [
    { name: 'build-number', type: 'command', command: 'git', args: ['rev-list', '--count', 'HEAD'], captureAs: 'buildNumber' },
    { name: 'build-image', type: 'command', dependsOn: ['build-number'], command: 'docker', args: ['build', '-t', 'app:{{buildNumber}}', '.'] },
    { name: 'db-up', type: 'service', service: 'db', action: 'up' },
    { name: 'deploy', type: 'group', dependsOn: ['build-image', 'db-up'], description: 'Everything' },
  ],
};

function configError(raw: unknown): ConfigError | undefined {
  try {
    Project.fromJson(raw, '/project/rig.json');
  } catch (e) {
    if (e instanceof ConfigError) { return e; }
    throw e;
  }
  return undefined;
}

test('targets from the config are registered in order', () => {
  const project = Project.fromJson(RIG_JSON, '/project/rig.json');

  expect(project.root).toEqual('/project');
  expect(project.graph.list().map(t => t.name)).toEqual(['build-number', 'build-image', 'db-up', 'deploy']);
  expect(project.graph.lookup('deploy').description).toEqual('Everything');
  expect(project.graph.resolve('deploy').targets.map(t => t.name)).toEqual(['build-number', 'build-image', 'db-up', 'deploy']);
});

test('services get their ports parsed and a container name', () => {
  const project = Project.fromJson(RIG_JSON, '/project/rig.json');

  expect(project.services.db).toEqual({
    name: 'db',
    image: 'postgres:16',
    ports: [{ host: 5432, container: 5432, protocol: 'tcp' }],
    env: { POSTGRES_PASSWORD: 'test-secret' },
    args: [],
    command: [],
  });
  expect(project.services.cache.name).toEqual('rig-cache');
  expect(project.services.cache.ports).toEqual([{ host: 6379, container: 6379, protocol: 'tcp' }]);
});

test('udp port', () => {
  const project = Project.fromJson({
    services: { dns: { image: 'coredns/coredns', ports: ['1053:53/udp'] } },
    targets: [],
  }, '/project/rig.json');

  expect(project.services.dns.ports).toEqual([{ host: 1053, container: 53, protocol: 'udp' }]);
});

test('parameter defaults become strings', () => {
  const project = Project.fromJson(RIG_JSON, '/project/rig.json');

  expect(project.config.params).toEqual({ environment: 'dev', replicas: '2' });
});

test('command line parameters override the defaults', () => {
  const project = Project.fromJson(RIG_JSON, '/project/rig.json');

  const ctx = project.createContext({ tools: new FakeTools(), params: { environment: 'prod' } });

  expect(ctx.params).toEqual({ environment: 'prod', replicas: '2' });
  expect(ctx.root).toEqual('/project');
  expect(ctx.services.runtime).toEqual('docker');
});

test('missing field is reported with its path', () => {
  const e = configError({ targets: [{ name: 'a', type: 'command' }] });

  expect(e?.issues).toEqual(['targets.0.command: Required']);
  expect(e?.message).toEqual('Invalid /project/rig.json\n  - targets.0.command: Required');
});

test('unknown fields are rejected', () => {
  const e = configError({ targets: [{ name: 'a', type: 'group', depends: ['b'] }] });

  expect(e?.issues).toHaveLength(1);
  expect(e?.issues[0]).toMatch(/^targets\.0: Unrecognized key\(s\) in object: 'depends'/);
});

test('target names cannot contain spaces', () => {
  const e = configError({ targets: [{ name: 'build image', type: 'group' }] });

  expect(e?.issues).toEqual(['targets.0.name: target names start with a letter or digit and contain no spaces']);
});

test('a bad port is reported', () => {
  const e = configError({ services: { db: { image: 'postgres', ports: ['lots'] } }, targets: [] });

  expect(e?.issues).toHaveLength(1);
  expect(e?.issues[0]).toMatch(/^services\.db\.ports\.0: /);
});

test('container names are checked', () => {
  const e = configError({ services: { db: { containerName: 'my db', image: 'postgres' } }, targets: [] });

  expect(e?.issues).toEqual(['services.db.containerName: container names start with a letter or digit and contain only letters, digits, _ . and -']);
});

test('a service key used as the container name is checked', () => {
  const e = configError({ services: { 'my db': { image: 'postgres' } }, targets: [] });

  expect(e?.issues).toEqual(['services.my db: service key is used as the container name; set containerName or use only letters, digits, _ . and -']);
});

test('any service key is fine with an explicit container name', () => {
  const project = Project.fromJson({ services: { 'my db': { containerName: 'my-db', image: 'postgres' } }, targets: [] }, '/project/rig.json');

  expect(project.services['my db'].name).toEqual('my-db');
});

test('service target must name a declared service', () => {
  const e = configError({ targets: [{ name: 'db-up', type: 'service', service: 'db', action: 'up' }] });

  expect(e?.message).toEqual("Target 'db-up' uses undeclared service 'db'");
});

test('selecting services', () => {
  const project = Project.fromJson(RIG_JSON, '/project/rig.json');

  expect(project.selectServices().map(s => s.name)).toEqual(['db', 'rig-cache']);
  expect(project.selectServices(['cache']).map(s => s.name)).toEqual(['rig-cache']);
  expect(() => project.selectServices(['queue'])).toThrow("No such service: 'queue' (declared: db, cache)");
});

test('rig.json is found upwards from the working directory', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-project-'));
  try {
    await fs.writeFile(path.join(dir, 'rig.json'), JSON.stringify(RIG_JSON));
    const nested = path.join(dir, 'src', 'api');
    await fs.mkdir(nested, { recursive: true });

    const project = await Project.load(undefined, nested);

    expect(project.file).toEqual(path.join(dir, 'rig.json'));
    expect(project.root).toEqual(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('the nearest rig.json wins', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-project-'));
  try {
    await fs.writeFile(path.join(dir, 'rig.json'), JSON.stringify(RIG_JSON));
    const service = path.join(dir, 'services', 'api');
    await fs.mkdir(path.join(service, 'src'), { recursive: true });
    await fs.writeFile(path.join(service, 'rig.json'), JSON.stringify({ targets: [{ name: 'api', type: 'group' }] }));

    const project = await Project.load(undefined, path.join(service, 'src'));

    expect(project.root).toEqual(service);
    expect(project.graph.list().map(t => t.name)).toEqual(['api']);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('explicit config file', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-project-'));
  try {
    const file = path.join(dir, 'staging.json');
    await fs.writeFile(file, JSON.stringify({ targets: [{ name: 'noop', type: 'group' }] }));

    const project = await Project.load(file);

    expect(project.graph.list().map(t => t.name)).toEqual(['noop']);
    expect(project.runtime).toEqual('docker');
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('config that is not JSON', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rig-project-'));
  try {
    const file = path.join(dir, 'rig.json');
    await fs.writeFile(file, '{ targets: ');

    await expect(Project.load(file)).rejects.toThrow(ConfigError);
    await expect(Project.load(file)).rejects.toThrow(`While parsing ${file}`);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
