import * as path from 'path';
import * as fs from 'fs-extra';
import * as os from 'os';
import { LicenseCatalog } from '../../core/license.catalog';
import { CatalogLoadFailedError, LicenseNotFoundError } from '../../errors/license.error';
import { createTestLogger } from '../helpers/fake-runner';

const BUILTIN_IDS = ['Apache-1.1', 'Apache-2.0', 'BSD-2-Clause', 'BSD-3-Clause', 'BSD-4-Clause', 'MIT'];

describe('LicenseCatalog', () => {
  describe('builtin', () => {
    const catalog = LicenseCatalog.builtin();

    it('should list the built-in licenses sorted by identifier', () => {
      expect(catalog.ids()).toEqual(BUILTIN_IDS);
      expect(catalog.size).toBe(6);
    });

    it('should look identifiers up case-insensitively', () => {
      expect(catalog.lookup('mit')).toBe(catalog.lookup('MIT'));
      expect(catalog.has('bsd-3-clause')).toBe(true);
      expect(catalog.lookup('apache-2.0').spdxId).toBe('Apache-2.0');
    });

    it('should mark built-in entries with their source', () => {
      const mit = catalog.lookup('MIT');

      expect(mit).toMatchObject({ id: 'MIT', name: 'MIT License', requiresAuthor: true, source: 'builtin' });
    });

    it('should throw LicenseNotFoundError listing what is available', () => {
      expect.assertions(3);
      try {
        catalog.lookup('WTFPL');
      } catch (error) {
        expect(error).toBeInstanceOf(LicenseNotFoundError);
        if (error instanceof LicenseNotFoundError) {
          expect(error.message).toBe("License 'WTFPL' is not available");
          expect(error.details).toBe(`Available licenses: ${BUILTIN_IDS.join(', ')}`);
        }
      }
    });

    it('should be read-only', () => {
      expect(Object.isFrozen(catalog)).toBe(true);
      expect(Object.isFrozen(catalog.lookup('MIT'))).toBe(true);
    });
  });

  describe('load', () => {
    let tempDir: string;
    let catalogPath: string;
    let logger: ReturnType<typeof createTestLogger>;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repoforge-catalog-'));
      catalogPath = path.join(tempDir, 'licenses.json');
      logger = createTestLogger();
    });

    afterEach(async () => {
      await fs.remove(tempDir);
    });

    it('should use the built-ins when no path is given', async () => {
      const catalog = await LicenseCatalog.load(undefined, logger);

      expect(catalog.ids()).toEqual(BUILTIN_IDS);
      expect(catalog.externalPath).toBeNull();
    });

    it('should use the built-ins when the file does not exist', async () => {
      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.ids()).toEqual(BUILTIN_IDS);
      expect(catalog.issues).toEqual([]);
      expect(catalog.loadError).toBeNull();
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should let an external entry override a built-in field by field', async () => {
      await fs.writeJson(catalogPath, { mit: { text: 'Custom MIT {year} {author}\n' } });

      const catalog = await LicenseCatalog.load(catalogPath, logger);
      const mit = catalog.lookup('MIT');

      expect(mit).toEqual({
        id: 'mit',
        name: 'MIT License',
        template: 'Custom MIT {year} {author}\n',
        requiresAuthor: true,
        spdxId: 'MIT',
        source: 'external',
      });
      expect(catalog.size).toBe(6);
      expect(catalog.externalPath).toBe(catalogPath);
    });

    it('should add new external entries with defaults', async () => {
      await fs.writeJson(catalogPath, { 'Acme-Internal': { text: 'Internal use only ({year}).\n' } });

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.lookup('acme-internal')).toEqual({
        id: 'Acme-Internal',
        name: 'Acme-Internal',
        template: 'Internal use only ({year}).\n',
        requiresAuthor: true,
        spdxId: undefined,
        source: 'external',
      });
      expect(catalog.ids()).toEqual(['Acme-Internal', ...BUILTIN_IDS]);
    });

    it('should skip an entry without text and keep the rest of the catalog', async () => {
      await fs.writeJson(catalogPath, {
        Acme: { name: 'Acme License' },
        Beta: { text: 'Beta {year} {author}' },
      });

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.issues).toEqual([{ id: 'Acme', reason: 'text: text is required' }]);
      expect(catalog.has('Acme')).toBe(false);
      expect(catalog.has('Beta')).toBe(true);
      expect(catalog.has('MIT')).toBe(true);
      expect(catalog.size).toBe(7);
      expect(logger.warn).toHaveBeenCalledWith(
        "Skipping license catalog entry 'Acme': text: text is required",
      );
    });

    it('should reject blank text', async () => {
      await fs.writeJson(catalogPath, { Acme: { text: '   ' } });

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.issues).toEqual([{ id: 'Acme', reason: 'text: text cannot be empty' }]);
    });

    it('should reject an entry that is not an object', async () => {
      await fs.writeJson(catalogPath, { Acme: 'just text' });

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.issues).toEqual([
        { id: 'Acme', reason: 'entry: Expected object, received string' },
      ]);
    });

    it('should reject unknown placeholders', async () => {
      await fs.writeJson(catalogPath, { Acme: { text: 'Copyright {year} {project}' } });

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.issues).toEqual([{ id: 'Acme', reason: 'unknown placeholder(s): {project}' }]);
      expect(catalog.has('Acme')).toBe(false);
    });

    it('should reject identifiers that differ only by case', async () => {
      await fs.writeFile(
        catalogPath,
        '{"Acme": {"text": "first {year}"}, "ACME": {"text": "second {year}"}}',
        'utf-8',
      );

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.lookup('acme').template).toBe('first {year}');
      expect(catalog.issues).toEqual([
        { id: 'ACME', reason: "duplicate identifier (case-insensitive) 'ACME'" },
      ]);
    });

    it('should record invalid JSON as a load error and keep the built-ins', async () => {
      await fs.writeFile(catalogPath, '{ not json', 'utf-8');

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.loadError).toBeInstanceOf(CatalogLoadFailedError);
      expect(catalog.loadError?.details?.startsWith('Invalid JSON: ')).toBe(true);
      expect(catalog.loadError?.message).toBe(
        `Failed to load license catalog ${catalogPath}; using built-in licenses only`,
      );
      expect(catalog.ids()).toEqual(BUILTIN_IDS);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should record a catalog that is not an object as a load error', async () => {
      await fs.writeJson(catalogPath, ['MIT']);

      const catalog = await LicenseCatalog.load(catalogPath, logger);

      expect(catalog.loadError?.details).toBe(
        'Catalog must be a JSON object mapping license identifiers to entries',
      );
      expect(catalog.size).toBe(6);
    });
  });
});
