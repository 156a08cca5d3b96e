import { describe, it, expect, afterEach } from '@jest/globals';
import { runBuildWorkflow, type WorkflowDeps } from '../../../src/workflows/build-workflow';
import type { BuildEnvironment } from '../../../src/environment/lifecycle';
import type { CliFlags } from '../../../src/domain/types/build';
import { ExitCode } from '../../../src/domain/types/errors';
import {
  FakeEngine,
  FakeGit,
  createFlags,
  createTempDir,
  createTestLogger,
  removeTempDir,
  type FakeGitState,
} from '../../utils/test-helpers';

class RecordingEnvironment implements BuildEnvironment {
  readonly events: string[] = [];

  async acquire(): Promise<void> {
    this.events.push('acquire');
  }

  async release(): Promise<void> {
    this.events.push('release');
  }
}

const ADDON_FILES = {
  Dockerfile: 'ARG BUILD_FROM\nFROM $BUILD_FROM\nARG BUILD_VERSION\n',
  'build.yaml': 'build_from:\n  amd64: example/base:amd64\n  armhf: example/base:armhf\n',
  'config.yaml': 'version: 1.0.0\narch: [amd64, armhf]\nimage: example/{arch}-addon\n',
};

describe('runBuildWorkflow', () => {
  let dir: string;

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function setup(gitState: FakeGitState = { repository: false }) {
    const git = new FakeGit(gitState);
    const engine = new FakeEngine();
    const environment = new RecordingEnvironment();
    const output: string[] = [];
    const deps: WorkflowDeps = {
      git,
      engine,
      logger: createTestLogger(),
      createEnvironment: () => environment,
      cwd: dir,
      write: (line) => output.push(line),
      now: () => new Date('2024-05-01T12:00:00Z'),
    };
    const run = (flags: Partial<CliFlags>) => runBuildWorkflow(createFlags(flags), deps);
    return { git, engine, environment, output, run };
  }

  it('should build every supported architecture inside the environment', async () => {
    dir = await createTempDir(ADDON_FILES);
    const { engine, environment, run } = setup();

    const outcome = await run({ all: true });

    expect(outcome.kind).toBe('build');
    expect(outcome.kind === 'build' && outcome.report.exitCode).toBe(ExitCode.OK);
    expect(environment.events).toEqual(['acquire', 'release']);
    expect(engine.refs('build')).toEqual(['example/amd64-addon:1.0.0', 'example/armhf-addon:1.0.0']);
    expect(engine.calls.find((call) => call.operation === 'build')?.request?.buildArgs).toContainEqual([
      'BUILD_VERSION',
      '1.0.0',
    ]);
  });

  it('should tag and push the released version from git', async () => {
    dir = await createTempDir(ADDON_FILES);
    const { engine, run } = setup({ head: 'f00dcaf', exactTag: 'v2.0.0', latestTag: 'v2.0.0' });

    await run({ architectures: ['armhf'], useGit: true, push: true });

    expect(engine.refs('tag')).toEqual(['example/armhf-addon:latest']);
    expect(engine.refs('push')).toEqual(['example/armhf-addon:2.0.0', 'example/armhf-addon:latest']);
  });

  it('should print the plan without touching the environment on a dry run', async () => {
    dir = await createTempDir(ADDON_FILES);
    const { engine, environment, output, run } = setup();

    const outcome = await run({ architectures: ['amd64'], dryRun: true });

    expect(outcome.kind).toBe('plan');
    expect(environment.events).toEqual([]);
    expect(engine.calls).toEqual([]);
    expect(output).toHaveLength(1);
  });

  it('should fail without a Dockerfile', async () => {
    dir = await createTempDir({ 'config.yaml': 'version: 1.0.0\n' });
    const { run } = setup();

    await expect(run({ architectures: ['amd64'] })).rejects.toMatchObject({ exitCode: ExitCode.DOCKERFILE });
  });

  it('should refuse to clone into a non-empty directory', async () => {
    dir = await createTempDir({ 'notes.txt': 'keep me' });
    const { git, run } = setup();

    await expect(run({ repository: 'https://example.com/addon.git' })).rejects.toMatchObject({
      exitCode: ExitCode.NOT_EMPTY,
    });
    expect(git.clones).toEqual([]);
  });

  it('should report a failed clone', async () => {
    dir = await createTempDir();
    const { run } = setup({ cloneOk: false });

    await expect(run({ repository: 'https://example.com/addon.git' })).rejects.toMatchObject({
      exitCode: ExitCode.GIT_CLONE,
    });
  });

  it('should clone the requested branch into the working directory', async () => {
    dir = await createTempDir();
    const { git, run } = setup();

    // the fake clone leaves the directory empty, so the Dockerfile check fails next
    await expect(run({ repository: 'https://example.com/addon.git', branch: 'dev' })).rejects.toMatchObject({
      exitCode: ExitCode.DOCKERFILE,
    });
    expect(git.clones).toEqual([{ repository: 'https://example.com/addon.git', branch: 'dev', destination: dir }]);
  });
});
