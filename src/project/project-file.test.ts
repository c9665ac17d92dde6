import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { Logger } from '../utils/logger.js';
import { createSuppression } from './defaults.js';
import { ProjectFileError } from './errors.js';
import { ProjectFile } from './project-file.js';
import type { ProjectFileOptions } from './project-file.js';
import { NO_LINE } from './types.js';
import type { ProjectConfigData, Suppression } from './types.js';

function quietLogger() {
  const logger = new Logger({ component: 'ProjectFileTest' });
  const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  return { logger, warn };
}

function createProject(options: ProjectFileOptions = {}): ProjectFile {
  return new ProjectFile({ env: {}, logger: quietLogger().logger, ...options });
}

const SAFE_CHARS = ['a', 'Z', '0', '9', '/', '\\', '.', '-', '_', '&', '<', '>', '"', "'", ':'];
const safeString = fc.stringOf(fc.constantFrom(...SAFE_CHARS), { minLength: 1, maxLength: 12 });
const safeList = fc.array(safeString, { maxLength: 4 });
const suppressionArb: fc.Arbitrary<Suppression> = fc.record({
  errorId: fc.oneof(fc.constant(''), safeString),
  fileName: fc.oneof(fc.constant(''), safeString),
  lineNumber: fc.oneof(fc.constant(NO_LINE), fc.integer({ min: 1, max: 100000 })),
  symbolName: fc.oneof(fc.constant(''), safeString),
});
const configArb: fc.Arbitrary<ProjectConfigData> = fc.record({
  rootPath: fc.oneof(fc.constant(''), safeString),
  buildDir: fc.oneof(fc.constant(''), safeString),
  importProject: fc.oneof(fc.constant(''), safeString),
  analyzeAllVsConfigs: fc.boolean(),
  includeDirs: safeList,
  defines: safeList,
  undefines: safeList,
  checkPaths: safeList,
  excludedPaths: safeList,
  libraries: safeList,
  platform: fc.oneof(fc.constant(''), safeString),
  suppressions: fc.array(suppressionArb, { maxLength: 3 }),
  addons: safeList,
  clangAnalyzer: fc.boolean(),
  clangTidy: fc.boolean(),
  tags: safeList,
});

function applyConfig(project: ProjectFile, data: ProjectConfigData): void {
  project.setRootPath(data.rootPath);
  project.setBuildDir(data.buildDir);
  project.setImportProject(data.importProject);
  project.setAnalyzeAllVsConfigs(data.analyzeAllVsConfigs);
  project.setIncludeDirs(data.includeDirs);
  project.setDefines(data.defines);
  project.setUndefines(data.undefines);
  project.setCheckPaths(data.checkPaths);
  project.setExcludedPaths(data.excludedPaths);
  project.setLibraries(data.libraries);
  project.setPlatform(data.platform);
  project.setSuppressions(data.suppressions);
  project.setAddons(data.addons);
  project.setClangAnalyzer(data.clangAnalyzer);
  project.setClangTidy(data.clangTidy);
  project.setTags(data.tags);
}

describe('ProjectFile', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'project-file-test-'));
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('construction', () => {
    it('should start with defaults', () => {
      const project = createProject();

      expect(project.getFilename()).toBe('');
      expect(project.getRootPath()).toBe('');
      expect(project.getPlatform()).toBe('');
      expect(project.getAnalyzeAllVsConfigs()).toBe(true);
      expect(project.getIncludeDirs()).toEqual([]);
      expect(project.getSuppressions()).toEqual([]);
      expect(project.getClangTidy()).toBe(false);
    });

    it('should keep the filename it was given', () => {
      expect(createProject({ filename: 'a.cppcheck' }).getFilename()).toBe('a.cppcheck');
    });
  });

  describe('round-trip', () => {
    it('should read back exactly what it wrote', () => {
      const file = path.join(tempDir, 'full.cppcheck');
      const project = createProject();
      project.setRootPath('..');
      project.setBuildDir('build');
      project.setPlatform('win64');
      project.setImportProject('app.sln');
      project.setAnalyzeAllVsConfigs(false);
      project.setIncludeDirs(['inc\\a', 'inc/b']);
      project.setDefines(['DEBUG=1']);
      project.setUndefines(['NDEBUG']);
      project.setCheckPaths(['src']);
      project.setExcludedPaths(['src\\gen']);
      project.setLibraries(['posix']);
      project.setSuppressions([
        createSuppression('nullPointer', { fileName: 'a.c', lineNumber: 3, symbolName: 'p' }),
      ]);
      project.setAddons(['misra']);
      project.setClangAnalyzer(true);
      project.setClangTidy(true);
      project.setTags(['release']);

      expect(project.write(file)).toBe(true);
      expect(project.getFilename()).toBe(file);

      const reopened = createProject();
      expect(reopened.read(file)).toBe(true);
      expect(reopened.toData()).toEqual(project.toData());
    });

    it('should round-trip any model', () => {
      const file = path.join(tempDir, 'property.cppcheck');
      fc.assert(
        fc.property(configArb, (data) => {
          const project = createProject();
          applyConfig(project, data);
          project.save(file);

          const reopened = createProject();
          reopened.load(file);
          expect(reopened.toData()).toEqual(data);
        }),
        { numRuns: 25 }
      );
    });

    it('should reopen through the static constructor', () => {
      const file = path.join(tempDir, 'open.cppcheck');
      writeFileSync(file, '<project version="1"><platform>unix32</platform></project>', 'utf-8');

      const project = ProjectFile.open(file, { env: {}, logger: quietLogger().logger });

      expect(project.getPlatform()).toBe('unix32');
      expect(project.getFilename()).toBe(file);
    });
  });

  describe('path normalization', () => {
    it('should return forward-slash paths while storing the original form', () => {
      const project = createProject();
      project.setIncludeDirs(['inc\\sub']);
      project.setCheckPaths(['src\\a', 'src/b']);
      project.setExcludedPaths(['out\\']);

      expect(project.getIncludeDirs()).toEqual(['inc/sub']);
      expect(project.getCheckPaths()).toEqual(['src/a', 'src/b']);
      expect(project.getExcludedPaths()).toEqual(['out/']);
      expect(project.toData().includeDirs).toEqual(['inc\\sub']);
      expect(project.toData().excludedPaths).toEqual(['out\\']);
    });

    it('should write paths in their stored form', () => {
      const file = path.join(tempDir, 'backslash.cppcheck');
      const project = createProject();
      project.setCheckPaths(['src\\core']);
      project.save(file);

      expect(readFileSync(file, 'utf-8')).toContain('<dir name="src\\core"/>');
    });

    it('should leave defines untouched', () => {
      const project = createProject();
      project.setDefines(['PATH=a\\b']);
      expect(project.getDefines()).toEqual(['PATH=a\\b']);
    });
  });

  describe('legacy documents', () => {
    it('should merge the legacy exclude spelling and write the canonical one', () => {
      const source = path.join(tempDir, 'legacy.cppcheck');
      const target = path.join(tempDir, 'legacy-out.cppcheck');
      writeFileSync(
        source,
        '<project><ignore><path name="old\\gen"/></ignore><exclude><path name="new"/></exclude></project>',
        'utf-8'
      );
      const project = createProject();

      expect(project.read(source)).toBe(true);
      expect(project.getExcludedPaths()).toEqual(['old/gen', 'new']);

      project.save(target);
      const written = readFileSync(target, 'utf-8');
      expect(written).not.toContain('<ignore');
      expect(written).toContain(
        '  <exclude>\n    <path name="old\\gen"/>\n    <path name="new"/>\n  </exclude>\n'
      );
    });
  });

  describe('read failures', () => {
    it('should keep the current settings when the file cannot be opened', () => {
      const { logger, warn } = quietLogger();
      const project = new ProjectFile({ env: {}, logger });
      project.setPlatform('win32W');
      const missing = path.join(tempDir, 'missing.cppcheck');

      expect(project.read(missing)).toBe(false);
      expect(project.getPlatform()).toBe('win32W');
      expect(warn).toHaveBeenCalledWith(
        'project_read_failed',
        expect.objectContaining({ filename: missing, errorType: 'open_error' })
      );
    });

    it('should leave the settings cleared when the root element is wrong', () => {
      const file = path.join(tempDir, 'wrong-root.cppcheck');
      writeFileSync(file, '<config><platform>unix64</platform></config>', 'utf-8');
      const { logger, warn } = quietLogger();
      const project = new ProjectFile({ env: {}, logger });
      project.setDefines(['A']);

      expect(project.read(file)).toBe(false);
      expect(project.getDefines()).toEqual([]);
      expect(project.getPlatform()).toBe('');
      expect(warn).toHaveBeenCalledWith(
        'project_read_failed',
        expect.objectContaining({ errorType: 'schema_error' })
      );
    });

    it('should leave the settings cleared when the XML is malformed', () => {
      const file = path.join(tempDir, 'malformed.cppcheck');
      writeFileSync(file, '<project><tags><tag>x</tags>', 'utf-8');
      const project = createProject();
      project.setTags(['keep']);

      expect(project.read(file)).toBe(false);
      expect(project.getTags()).toEqual([]);
    });

    it('should throw from load', () => {
      const project = createProject();
      try {
        project.load(path.join(tempDir, 'absent.cppcheck'));
        expect.unreachable('load should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ProjectFileError);
        if (error instanceof ProjectFileError) {
          expect(error.errorType).toBe('open_error');
        }
      }
    });

    it('should fail to read without a filename', () => {
      expect(createProject().read()).toBe(false);
    });
  });

  describe('write failures', () => {
    it('should report false when the directory does not exist', () => {
      const { logger, warn } = quietLogger();
      const project = new ProjectFile({ env: {}, logger });
      const target = path.join(tempDir, 'no-such-dir', 'a.cppcheck');

      expect(project.write(target)).toBe(false);
      expect(warn).toHaveBeenCalledWith(
        'project_write_failed',
        expect.objectContaining({ filename: target, errorType: 'write_error' })
      );
    });

    it('should keep the settings after a failed write', () => {
      const project = createProject();
      project.setTags(['t']);
      project.write(path.join(tempDir, 'missing-dir', 'b.cppcheck'));
      expect(project.getTags()).toEqual(['t']);
    });

    it('should fail to write without a filename', () => {
      expect(createProject().write()).toBe(false);
    });
  });

  describe('clear', () => {
    it('should reset settings and keep the filename', () => {
      const project = createProject({ filename: 'keep.cppcheck' });
      project.setBuildDir('b');
      project.setClangTidy(true);
      project.setAnalyzeAllVsConfigs(false);

      project.clear();

      expect(project.getBuildDir()).toBe('');
      expect(project.getClangTidy()).toBe(false);
      expect(project.getAnalyzeAllVsConfigs()).toBe(true);
      expect(project.getFilename()).toBe('keep.cppcheck');
    });
  });

  describe('accessor isolation', () => {
    it('should not expose internal lists', () => {
      const project = createProject();
      const tags = ['a'];
      project.setTags(tags);
      tags.push('b');
      project.getTags().push('c');

      expect(project.getTags()).toEqual(['a']);
    });

    it('should not expose internal suppressions', () => {
      const project = createProject();
      project.setSuppressions([createSuppression('id')]);
      const [first] = project.getSuppressions();
      if (first !== undefined) {
        Object.assign(first, { errorId: 'changed' });
      }

      expect(project.getSuppressions()).toEqual([createSuppression('id')]);
    });
  });

  describe('tools', () => {
    it('should list addons followed by enabled tools', () => {
      const project = createProject();
      project.setAddons(['misra', 'cert']);
      project.setClangAnalyzer(true);
      project.setClangTidy(true);

      expect(project.getAddonsAndTools()).toEqual(['misra', 'cert', 'clang-analyzer', 'clang-tidy']);
      expect(project.getAddons()).toEqual(['misra', 'cert']);
    });

    it('should report the analyzer as disabled unless the setting allows it', () => {
      const project = createProject();
      project.setClangAnalyzer(true);

      expect(project.getClangAnalyzer()).toBe(false);
      expect(project.toData().clangAnalyzer).toBe(true);
      expect(project.getAddonsAndTools()).toEqual(['clang-analyzer']);
    });

    it('should report the stored analyzer flag when the setting is on', () => {
      const project = createProject({ settings: { reportClangAnalyzer: true } });
      project.setClangAnalyzer(true);
      expect(project.getClangAnalyzer()).toBe(true);
    });

    it('should take the analyzer setting from the environment', () => {
      const project = new ProjectFile({
        env: { PROJECT_FILE_REPORT_CLANG_ANALYZER: 'on' },
        logger: quietLogger().logger,
      });
      project.setClangAnalyzer(true);
      expect(project.getClangAnalyzer()).toBe(true);
    });
  });

  describe('settings', () => {
    it('should write with the configured indentation', () => {
      const file = path.join(tempDir, 'indent.cppcheck');
      const project = createProject({ env: { PROJECT_FILE_INDENT: '4' } });
      project.setTags(['x']);
      project.save(file);

      expect(readFileSync(file, 'utf-8')).toContain('\n    <tags>\n        <tag>x</tag>\n    </tags>\n');
    });
  });

  describe('getBaseDirectory', () => {
    it('should use the document directory without a root path', () => {
      const project = createProject({ filename: path.join(tempDir, 'p.cppcheck') });
      expect(project.getBaseDirectory()).toBe(tempDir);
    });

    it('should resolve the root path against the document directory', () => {
      const project = createProject({ filename: path.join(tempDir, 'p.cppcheck') });
      project.setRootPath('..');
      expect(project.getBaseDirectory()).toBe(path.dirname(tempDir));
    });

    it('should use the working directory when there is no filename', () => {
      expect(createProject().getBaseDirectory()).toBe(process.cwd());
    });
  });
});
