import type { TypeConverter } from '../emitter/type-registry';
import type { GenerationPass } from '../composer/pass';
import type { Logger } from '../logging';
import type {
  Diagnostic,
  ModelProvider,
  PatchFileResult,
  PatchInstruction
} from '../types';

import { composeUnit, defaultPasses } from '../composer/compose';
import { DiagnosticsCollector } from '../composer/diagnostics';
import { generationOptionsSchema, pipelineOptionsSchema } from '../config/schema';
import { validateWithSchema } from '../config/validator';
import { createTypeRegistry, type TypeRegistry } from '../emitter/type-registry';
import { SourceReadError, toError } from '../errors';
import { type FileSystem, nodeFileSystem } from '../file-system';
import { createNoOpLogger, createScopedLogger, type LogLevel } from '../logging';
import { applyPatches } from '../patcher/apply-patches';
import { formatPatchSummary } from '../patcher/report';
import { readUnit } from '../reader';
import { companionPath, renderCompanion, siblingSpecifier } from './companion';

export type CodegenOptions = {
  /**
   * Source modules to process. Duplicates are processed once.
   */
  files: readonly string[];

  /**
   * Global generation defaults, the broadest configuration scope.
   */
  defaults?: unknown;

  /**
   * Inserted between stem and extension of the companion module.
   * @default '.g'
   */
  companionSuffix?: string;

  /**
   * Patch delegating `fromJson` / `toJson` members and the companion import
   * into the sources.
   * @default true
   */
  patchSources?: boolean;

  /**
   * Consulted before the built-in converters.
   */
  converters?: readonly TypeConverter[];

  /**
   * @default readUnit
   */
  modelProvider?: ModelProvider;

  /**
   * @default nodeFileSystem
   */
  fileSystem?: FileSystem;

  /**
   * Takes precedence over `logLevel`.
   */
  logger?: Logger;

  /**
   * Level of the console logger created when no `logger` is given. Without
   * either, nothing is logged.
   */
  logLevel?: LogLevel;
};

export type UnitStatus =
  /**
   * The unit was composed; its companion (if any) is up to date.
   */
  | 'generated'

  /**
   * The unit has no annotated element.
   */
  | 'skipped'

  /**
   * The unit was aborted; nothing of it was written or patched.
   */
  | 'failed';

export type UnitReport = {
  readonly path: string;
  readonly status: UnitStatus;
  readonly companionPath: string;

  /**
   * `true` when the companion file was (re)written in this run.
   */
  readonly companionWritten: boolean;

  readonly diagnostics: readonly Diagnostic[];
};

export type CodegenResult = {
  readonly units: readonly UnitReport[];
  readonly patches: readonly PatchFileResult[];

  /**
   * Every diagnostic of the run: unit diagnostics in file order, then one
   * error per failed patch batch.
   */
  readonly diagnostics: readonly Diagnostic[];
};

type UnitOutcome = {
  readonly report: UnitReport;
  readonly patches: readonly PatchInstruction[];
};

type RunSettings = {
  readonly defaults: unknown;
  readonly suffix: string;
  readonly passes: readonly GenerationPass[];
  readonly registry: TypeRegistry;
  readonly modelProvider: ModelProvider;
  readonly fileSystem: FileSystem;
  readonly logger: Logger;
};

function logDiagnostics(logger: Logger, diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    const data = { code: diagnostic.code, element: diagnostic.element, unit: diagnostic.unit };
    switch (diagnostic.severity) {
      case 'error':
        logger.error(diagnostic.message, data);
        break;
      case 'warning':
        logger.warn(diagnostic.message, data);
        break;
      case 'info':
        logger.info(diagnostic.message, data);
        break;
    }
  }
}

async function readExisting(fileSystem: FileSystem, path: string): Promise<string | null> {
  try {
    return await fileSystem.readFile(path);
  } catch {
    // Missing companion: first run.
    return null;
  }
}

/**
 * Reads, composes and writes the companion of one unit.
 *
 * Any error aborts the unit: its companion is not written and its patches
 * are dropped. The error becomes a diagnostic of the unit.
 */
async function processUnit(path: string, settings: RunSettings): Promise<UnitOutcome> {
  const { fileSystem, logger } = settings;
  const diagnostics = new DiagnosticsCollector(path);
  const companion = companionPath(path, settings.suffix);

  const report = (status: UnitStatus, companionWritten = false): UnitReport => ({
    path,
    status,
    companionPath: companion,
    companionWritten,
    diagnostics: diagnostics.diagnostics
  });

  try {
    let source: string;
    try {
      source = await fileSystem.readFile(path);
    } catch (error) {
      throw new SourceReadError(`Cannot read ${path}: ${toError(error).message}`, path, error);
    }

    const unit = settings.modelProvider(path, source);
    if (unit.elements.length === 0) {
      logger.debug('No annotated elements', { path });
      return { report: report('skipped'), patches: [] };
    }

    const composed = composeUnit(unit, settings.passes, {
      defaults: settings.defaults,
      registry: settings.registry,
      diagnostics,
      companionSpecifier: siblingSpecifier(companion)
    });

    let companionWritten = false;
    if (composed.output !== '') {
      const contents = renderCompanion(unit, composed.output, {
        source: siblingSpecifier(path),
        companion: siblingSpecifier(companion)
      });

      if ((await readExisting(fileSystem, companion)) !== contents) {
        await fileSystem.writeFile(companion, contents);
        companionWritten = true;
        logger.info('Companion written', { path: companion });
      } else {
        logger.debug('Companion unchanged', { path: companion });
      }
    }

    logger.info('Unit generated', {
      path,
      fragments: composed.fragments.length,
      patches: composed.patches.length
    });
    return { report: report('generated', companionWritten), patches: composed.patches };
  } catch (error) {
    diagnostics.reportError(error);
    return { report: report('failed'), patches: [] };
  } finally {
    logDiagnostics(logger, diagnostics.diagnostics);
  }
}

function createLogger(options: CodegenOptions): Logger {
  if (options.logger) return options.logger;
  return options.logLevel ? createScopedLogger('codegen', options.logLevel) : createNoOpLogger();
}

/**
 * Runs code generation over a set of source modules.
 *
 * 1. Units are read and composed concurrently; each writes its companion
 *    module when the content changed.
 * 2. The patch instructions of all successful units are merged and applied,
 *    one batch per file.
 *
 * A failing unit never affects its siblings. Companions written by
 * successful units stay when another unit fails.
 *
 * @throws {ConfigurationError} When the options or the global defaults are
 *         malformed. Nothing is read or written in that case.
 */
export async function runCodegen(options: CodegenOptions): Promise<CodegenResult> {
  const { files, companionSuffix, patchSources } = validateWithSchema(
    pipelineOptionsSchema,
    {
      files: options.files,
      companionSuffix: options.companionSuffix,
      patchSources: options.patchSources,
      logLevel: options.logLevel
    },
    'options'
  );
  validateWithSchema(generationOptionsSchema, options.defaults ?? {}, 'defaults');

  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const logger = createLogger(options);

  const settings: RunSettings = {
    defaults: options.defaults,
    suffix: companionSuffix,
    passes: defaultPasses({ inPlace: patchSources }),
    registry: createTypeRegistry(options.converters),
    modelProvider: options.modelProvider ?? readUnit,
    fileSystem,
    logger
  };

  const outcomes = await Promise.all(
    [...new Set(files)].map(path => processUnit(path, settings))
  );

  const patches = await applyPatches(
    outcomes.flatMap(outcome => outcome.patches),
    { fileSystem }
  );

  const patchDiagnostics = patches.flatMap(result => {
    if (!result.error) return [];
    const collector = new DiagnosticsCollector(result.filePath);
    collector.reportError(result.error);
    return collector.diagnostics;
  });
  logDiagnostics(logger, patchDiagnostics);

  const summary = formatPatchSummary(patches);
  if (summary) logger.info(summary);

  return {
    units: outcomes.map(outcome => outcome.report),
    patches,
    diagnostics: [
      ...outcomes.flatMap(outcome => outcome.report.diagnostics),
      ...patchDiagnostics
    ]
  };
}
