import * as path from 'path';
import * as fs from 'fs-extra';
import * as os from 'os';
import { RepoOrchestrator } from '../../core/repo.orchestrator';
import { RepositoryService } from '../../core/repository.service';
import { LicenseCatalog } from '../../core/license.catalog';
import { renderLicense } from '../../core/license.renderer';
import { ErrorKind } from '../../types/operation.types';
import { DEFAULT_CONFIG } from '../../types/config.types';
import { createTestLogger, FakeCommandRunner } from '../helpers/fake-runner';

describe('RepoOrchestrator', () => {
  const catalog = LicenseCatalog.builtin();
  const now = (): Date => new Date('2024-06-01T12:00:00Z');

  let tempDir: string;
  let licensePath: string;
  let runner: FakeCommandRunner;
  let logger: ReturnType<typeof createTestLogger>;
  let orchestrator: RepoOrchestrator;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoforge-orchestrator-'));
    licensePath = path.join(tempDir, 'LICENSE');
    runner = new FakeCommandRunner();
    logger = createTestLogger();
    const repository = new RepositoryService(tempDir, runner, {}, logger);
    orchestrator = new RepoOrchestrator(repository, catalog, { now, logger });
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('generateLicense', () => {
    it('should stop at lookup for an unknown license', async () => {
      const result = await orchestrator.generateLicense({ licenseId: 'WTFPL', author: 'Jane Doe' });

      expect(result.success).toBe(false);
      expect(result.errorKind).toBe(ErrorKind.LICENSE_NOT_FOUND);
      expect(result.failedStep).toBe('lookup');
      expect(result.completedSteps).toEqual([]);
      expect(result.fileWritten).toBe(false);
      expect(result.message).toBe(
        "License 'WTFPL' is not available. Available licenses: Apache-1.1, Apache-2.0, BSD-2-Clause, BSD-3-Clause, BSD-4-Clause, MIT",
      );
      expect(await fs.pathExists(licensePath)).toBe(false);
    });

    it('should stop at render when a required author is missing', async () => {
      const result = await orchestrator.generateLicense({ licenseId: 'MIT', author: '' });

      expect(result.errorKind).toBe(ErrorKind.PRECONDITION_FAILED);
      expect(result.failedStep).toBe('render');
      expect(result.completedSteps).toEqual(['lookup']);
      expect(result.message).toBe("License 'MIT' requires an author/organization name");
      expect(await fs.pathExists(licensePath)).toBe(false);
    });

    it('should write and stage the license in a repository', async () => {
      await fs.ensureDir(path.join(tempDir, '.git'));

      const result = await orchestrator.generateLicense({ licenseId: 'mit', author: 'Jane Doe' });

      expect(result.success).toBe(true);
      expect(result.errorKind).toBeNull();
      expect(result.fileWritten).toBe(true);
      expect(result.staged).toBe(true);
      expect(result.completedSteps).toEqual(['lookup', 'render', 'write', 'stage']);
      expect(result.licenseId).toBe('MIT');
      expect(result.message).toBe(`Generated MIT license at ${licensePath} and staged it`);
      expect(await fs.readFile(licensePath, 'utf-8')).toBe(
        renderLicense(catalog.lookup('MIT'), 'Jane Doe', 2024).text,
      );
      expect(runner.commands()).toEqual(['add -- LICENSE']);
    });

    it('should report a partial failure when staging fails after the write', async () => {
      const result = await orchestrator.generateLicense({ licenseId: 'MIT', author: 'Jane Doe' });

      expect(result.success).toBe(false);
      expect(result.errorKind).toBe(ErrorKind.PARTIAL_SEQUENCE_FAILURE);
      expect(result.fileWritten).toBe(true);
      expect(result.staged).toBe(false);
      expect(result.failedStep).toBe('stage');
      expect(result.completedSteps).toEqual(['lookup', 'render', 'write']);
      expect(result.stageResult?.reason).toBe('NOT_INITIALIZED');
      expect(result.message).toBe(
        `Wrote ${licensePath} but staging failed: Not a git repository: ${tempDir}`,
      );
      expect(await fs.pathExists(licensePath)).toBe(true);
      expect(runner.calls).toEqual([]);
    });

    it('should report a partial failure when staging throws after the write', async () => {
      await fs.ensureDir(path.join(tempDir, '.git'));
      runner.on('add -- LICENSE', new Error('runner exploded'));

      const result = await orchestrator.generateLicense({ licenseId: 'MIT', author: 'Jane Doe' });

      expect(result.success).toBe(false);
      expect(result.errorKind).toBe(ErrorKind.PARTIAL_SEQUENCE_FAILURE);
      expect(result.fileWritten).toBe(true);
      expect(result.staged).toBe(false);
      expect(result.failedStep).toBe('stage');
      expect(result.completedSteps).toEqual(['lookup', 'render', 'write']);
      expect(result.message).toBe(`Wrote ${licensePath} but staging failed: runner exploded`);
      expect(await fs.pathExists(licensePath)).toBe(true);
      expect(logger.error).toHaveBeenCalledWith('Staging LICENSE failed', expect.any(Error));
    });

    it('should skip staging when asked', async () => {
      const result = await orchestrator.generateLicense({
        licenseId: 'MIT',
        author: 'Jane Doe',
        stage: false,
      });

      expect(result.success).toBe(true);
      expect(result.staged).toBe(false);
      expect(result.message).toBe(`Generated MIT license at ${licensePath}`);
      expect(runner.calls).toEqual([]);
    });

    it('should warn when replacing an existing file', async () => {
      await fs.writeFile(licensePath, 'old text', 'utf-8');

      const result = await orchestrator.generateLicense({
        licenseId: 'MIT',
        author: 'Jane Doe',
        stage: false,
      });

      expect(result.warnings).toEqual(['Replaced existing LICENSE']);
      expect(await fs.readFile(licensePath, 'utf-8')).not.toBe('old text');
    });

    it('should honor the configured file name and an explicit year', async () => {
      const repository = new RepositoryService(tempDir, runner, {}, logger);
      orchestrator = new RepoOrchestrator(repository, catalog, {
        licenseFileName: 'COPYING',
        stageLicense: false,
        now,
        logger,
      });

      const result = await orchestrator.generateLicense({
        licenseId: 'BSD-3-Clause',
        author: 'Acme',
        year: 1999,
      });

      expect(result.filePath).toBe(path.join(tempDir, 'COPYING'));
      expect(result.rendered?.year).toBe(1999);
      const text = await fs.readFile(path.join(tempDir, 'COPYING'), 'utf-8');
      expect(text.startsWith('BSD 3-Clause License\n\nCopyright (c) 1999 Acme\n')).toBe(true);
      expect(runner.calls).toEqual([]);
    });

    it('should return a frozen result', async () => {
      const result = await orchestrator.generateLicense({ licenseId: 'WTFPL', author: 'x' });

      expect(Object.isFrozen(result)).toBe(true);
    });
  });

  describe('repository actions', () => {
    it('should delegate to the repository service', async () => {
      await fs.ensureDir(path.join(tempDir, '.git'));
      runner.on('branch --list --no-color', { stdout: '* main\n' });

      const result = await orchestrator.listBranches();

      expect(result.data?.current).toBe('main');
      expect(runner.commands()).toEqual(['branch --list --no-color']);
    });

    it('should list licenses from its catalog', () => {
      expect(orchestrator.listLicenses().map(entry => entry.id)).toEqual(catalog.ids());
    });
  });

  describe('create', () => {
    it('should load the external catalog', async () => {
      const catalogPath = path.join(tempDir, 'licenses.json');
      await fs.writeJson(catalogPath, { Acme: { name: 'Acme License', text: 'Acme {year}\n' } });

      const created = await RepoOrchestrator.create(tempDir, { ...DEFAULT_CONFIG }, catalogPath, logger);

      expect(created.getCatalog().lookup('acme').name).toBe('Acme License');
      expect(created.getCatalog().externalPath).toBe(catalogPath);
    });
  });
});
