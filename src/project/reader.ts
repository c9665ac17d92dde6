/**
 * Reader for project files.
 *
 * Accepts partial and legacy documents: anything below the root element that
 * is missing or malformed keeps its default value. Only unreadable XML and a
 * wrong root element abort the read.
 *
 * @packageDocumentation
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { createDefaultProjectConfig } from './defaults.js';
import { ProjectFileError, toError } from './errors.js';
import {
  BYTE_ORDER_MARK,
  CLANG_ANALYZER,
  CLANG_TIDY,
  PROJECT_ELEMENT,
  PROJECT_FILE_VERSION,
  PROJECT_VERSION_ATTRIBUTE,
  SCALAR_ELEMENTS,
  SUPPRESSIONS,
  TOOLS,
  findLabeledList,
} from './schema.js';
import type { LabeledList } from './schema.js';
import { NO_LINE, isValidLineNumber } from './types.js';
import type { MutableProjectConfigData, ProjectConfigData, Suppression } from './types.js';
import { ATTRIBUTE_PREFIX, asNodeList, attributeOf, childElements, elementName, textOf } from './xml-nodes.js';
import type { XmlNode } from './xml-nodes.js';
import type { Logger } from '../utils/logger.js';

/**
 * Options for reading a project document.
 */
export interface ReadOptions {
  /** Receives debug entries about tolerated anomalies. */
  logger?: Logger;
}

const LINE_NUMBER_PATTERN = /^\s*[+-]?\d+\s*$/;

function createParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });
}

/**
 * Parses a suppression line number.
 *
 * @param raw - Attribute value, if present.
 * @returns The line number, or NO_LINE when absent, unparseable, not positive or
 *   beyond the 32-bit range.
 */
export function parseLineNumber(raw: string | undefined): number {
  if (raw === undefined || !LINE_NUMBER_PATTERN.test(raw)) {
    return NO_LINE;
  }
  const value = Number.parseInt(raw, 10);
  return isValidLineNumber(value) ? value : NO_LINE;
}

function readSuppression(node: XmlNode): Suppression {
  return {
    errorId: textOf(node, SUPPRESSIONS.item),
    fileName: attributeOf(node, SUPPRESSIONS.fileNameAttribute) ?? '',
    lineNumber: parseLineNumber(attributeOf(node, SUPPRESSIONS.lineNumberAttribute)),
    symbolName: attributeOf(node, SUPPRESSIONS.symbolNameAttribute) ?? '',
  };
}

function readLabeledList(config: MutableProjectConfigData, list: LabeledList, container: XmlNode): void {
  for (const item of childElements(container, list.container)) {
    if (elementName(item) !== list.item) {
      continue;
    }
    if (list.style.kind === 'attribute') {
      const value = attributeOf(item, list.style.attribute);
      if (value !== undefined) {
        config[list.field].push(value);
      }
    } else {
      config[list.field].push(textOf(item, list.item));
    }
  }
}

function readTools(config: MutableProjectConfigData, container: XmlNode): void {
  for (const item of childElements(container, TOOLS.container)) {
    if (elementName(item) !== TOOLS.item) {
      continue;
    }
    const tool = textOf(item, TOOLS.item);
    if (tool === CLANG_ANALYZER) {
      config.clangAnalyzer = true;
    } else if (tool === CLANG_TIDY) {
      config.clangTidy = true;
    }
  }
}

function applyElement(config: MutableProjectConfigData, name: string, node: XmlNode): void {
  switch (name) {
    case SCALAR_ELEMENTS.rootPath.element: {
      const rootPath = attributeOf(node, SCALAR_ELEMENTS.rootPath.attribute);
      if (rootPath !== undefined && rootPath !== '') {
        config.rootPath = rootPath;
      }
      return;
    }
    case SCALAR_ELEMENTS.buildDir.element:
      config.buildDir = textOf(node, name);
      return;
    case SCALAR_ELEMENTS.platform.element:
      config.platform = textOf(node, name);
      return;
    case SCALAR_ELEMENTS.importProject.element:
      config.importProject = textOf(node, name);
      return;
    case SCALAR_ELEMENTS.analyzeAllVsConfigs.element: {
      const text = textOf(node, name);
      if (text !== '') {
        config.analyzeAllVsConfigs = text === 'true';
      }
      return;
    }
    case SUPPRESSIONS.container:
      for (const item of childElements(node, name)) {
        if (elementName(item) === SUPPRESSIONS.item) {
          config.suppressions.push(readSuppression(item));
        }
      }
      return;
    case TOOLS.container:
      readTools(config, node);
      return;
    default: {
      const list = findLabeledList(name);
      if (list !== undefined) {
        readLabeledList(config, list, node);
      }
    }
  }
}

/**
 * Parses a project document into a fully defaulted project model.
 *
 * @param xml - Document text. A leading byte-order mark is ignored.
 * @param options - Read options.
 * @returns The project model.
 * @throws ProjectFileError with `parse_error` for malformed XML, or
 *   `schema_error` when the root element is not `project`.
 *
 * @example
 * ```typescript
 * const config = parseProjectDocument('<project version="1"><platform>unix64</platform></project>');
 * console.log(config.platform); // "unix64"
 * ```
 */
export function parseProjectDocument(xml: string, options?: ReadOptions): ProjectConfigData {
  const source = xml.startsWith(BYTE_ORDER_MARK) ? xml.slice(BYTE_ORDER_MARK.length) : xml;

  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new ProjectFileError(`Malformed project file: ${msg}`, 'parse_error', {
      details: `${code} at line ${String(line)}, column ${String(col)}`,
    });
  }

  let document: unknown;
  try {
    document = createParser().parse(source);
  } catch (error) {
    const cause = toError(error);
    throw new ProjectFileError(`Malformed project file: ${cause.message}`, 'parse_error', {
      cause,
    });
  }

  const root = asNodeList(document).find((node) => elementName(node) !== undefined);
  const rootName = root === undefined ? undefined : elementName(root);
  if (root === undefined || rootName !== PROJECT_ELEMENT) {
    throw new ProjectFileError(
      `Not a project file: expected root element '${PROJECT_ELEMENT}'`,
      'schema_error',
      { details: rootName === undefined ? 'No root element' : `Found '${rootName}'` }
    );
  }

  const version = attributeOf(root, PROJECT_VERSION_ATTRIBUTE);
  if (version !== PROJECT_FILE_VERSION) {
    options?.logger?.debug('unexpected_schema_version', { version: version ?? null });
  }

  const config = createDefaultProjectConfig();
  for (const child of childElements(root, PROJECT_ELEMENT)) {
    const name = elementName(child);
    if (name !== undefined) {
      applyElement(config, name, child);
    }
  }
  return config;
}
