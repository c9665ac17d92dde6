/**
 * Writer for project files.
 *
 * Always produces the canonical form: fixed element order, one list style per
 * container, no empty containers and no legacy spellings.
 *
 * @packageDocumentation
 */

import { XMLBuilder } from 'fast-xml-parser';
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
  WRITE_ORDER,
  canonicalList,
} from './schema.js';
import type { LabeledList, ProjectSection } from './schema.js';
import { isValidLineNumber } from './types.js';
import type { ProjectConfigData, Suppression } from './types.js';
import { ATTRIBUTE_PREFIX, element, textElement } from './xml-nodes.js';
import type { XmlNode } from './xml-nodes.js';

/**
 * Options for serializing a project document.
 */
export interface WriteOptions {
  /** Indentation unit; an empty string writes the document on one line. Default is two spaces. */
  indentBy?: string;
}

/** XML declaration written after the byte-order mark. */
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Derives the tool identifiers implied by the tool flags.
 *
 * @param data - Flags to derive from.
 * @returns Tool identifiers, each at most once.
 */
export function toolNames(data: Pick<ProjectConfigData, 'clangAnalyzer' | 'clangTidy'>): string[] {
  const tools: string[] = [];
  if (data.clangAnalyzer) {
    tools.push(CLANG_ANALYZER);
  }
  if (data.clangTidy) {
    tools.push(CLANG_TIDY);
  }
  return tools;
}

function listItem(list: LabeledList, value: string): XmlNode {
  return list.style.kind === 'attribute'
    ? element(list.item, [], { [list.style.attribute]: value })
    : textElement(list.item, value);
}

function textList(container: string, item: string, values: readonly string[]): XmlNode[] {
  if (values.length === 0) {
    return [];
  }
  return [element(container, values.map((value) => textElement(item, value)))];
}

function suppressionNode(suppression: Suppression): XmlNode {
  const attributes: Record<string, string> = {};
  if (suppression.fileName !== '') {
    attributes[SUPPRESSIONS.fileNameAttribute] = suppression.fileName;
  }
  if (isValidLineNumber(suppression.lineNumber)) {
    attributes[SUPPRESSIONS.lineNumberAttribute] = String(suppression.lineNumber);
  }
  if (suppression.symbolName !== '') {
    attributes[SUPPRESSIONS.symbolNameAttribute] = suppression.symbolName;
  }
  return textElement(SUPPRESSIONS.item, suppression.errorId, attributes);
}

function scalarNodes(data: ProjectConfigData, field: keyof typeof SCALAR_ELEMENTS): XmlNode[] {
  switch (field) {
    case 'rootPath':
      return data.rootPath === ''
        ? []
        : [
            element(SCALAR_ELEMENTS.rootPath.element, [], {
              [SCALAR_ELEMENTS.rootPath.attribute]: data.rootPath,
            }),
          ];
    case 'analyzeAllVsConfigs':
      return [
        textElement(
          SCALAR_ELEMENTS.analyzeAllVsConfigs.element,
          data.analyzeAllVsConfigs ? 'true' : 'false'
        ),
      ];
    case 'buildDir':
    case 'platform':
    case 'importProject': {
      const value = data[field];
      return value === '' ? [] : [textElement(SCALAR_ELEMENTS[field].element, value)];
    }
  }
}

function sectionNodes(data: ProjectConfigData, section: ProjectSection): XmlNode[] {
  switch (section.kind) {
    case 'scalar':
      return scalarNodes(data, section.field);
    case 'list': {
      const values = data[section.field];
      if (values.length === 0) {
        return [];
      }
      const list = canonicalList(section.field);
      return [element(list.container, values.map((value) => listItem(list, value)))];
    }
    case 'suppressions':
      return data.suppressions.length === 0
        ? []
        : [element(SUPPRESSIONS.container, data.suppressions.map(suppressionNode))];
    case 'tools':
      return textList(TOOLS.container, TOOLS.item, toolNames(data));
  }
}

/**
 * Serializes a project model into a canonical project document.
 *
 * @param data - The project model.
 * @param options - Formatting options.
 * @returns Document text starting with a byte-order mark and an XML declaration.
 *
 * @example
 * ```typescript
 * const xml = serializeProjectDocument({ ...DEFAULT_PROJECT_CONFIG, platform: 'unix64' });
 * ```
 */
export function serializeProjectDocument(data: ProjectConfigData, options?: WriteOptions): string {
  const indentBy = options?.indentBy ?? '  ';
  const children = WRITE_ORDER.flatMap((section) => sectionNodes(data, section));
  const project = element(PROJECT_ELEMENT, children, {
    [PROJECT_VERSION_ATTRIBUTE]: PROJECT_FILE_VERSION,
  });

  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    format: indentBy.length > 0,
    indentBy,
    suppressEmptyNode: true,
  });
  const body: unknown = builder.build([project]);

  return `${BYTE_ORDER_MARK}${XML_DECLARATION}\n${String(body).trim()}\n`;
}
