/**
 * Element and attribute names of the project file format.
 *
 * The reader and the writer share this table. Adding a list-valued setting
 * takes one entry in {@link LABELED_LISTS}.
 *
 * @packageDocumentation
 */

import type { ProjectListField } from './types.js';

/** Name of the root element. */
export const PROJECT_ELEMENT = 'project';

/** Attribute of the root element carrying the schema version. */
export const PROJECT_VERSION_ATTRIBUTE = 'version';

/** Schema version written by this package. */
export const PROJECT_FILE_VERSION = '1';

/** Byte-order mark written at the start of every document and skipped on read. */
export const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Elements holding a single value.
 */
export const SCALAR_ELEMENTS = {
  rootPath: { element: 'root', attribute: 'name' },
  buildDir: { element: 'builddir' },
  platform: { element: 'platform' },
  importProject: { element: 'importproject' },
  analyzeAllVsConfigs: { element: 'analyze-all-vs-configs' },
} as const;

/**
 * Suppression list element names.
 */
export const SUPPRESSIONS = {
  container: 'suppressions',
  item: 'suppression',
  fileNameAttribute: 'fileName',
  lineNumberAttribute: 'lineNumber',
  symbolNameAttribute: 'symbolName',
} as const;

/**
 * Tool list element names.
 */
export const TOOLS = {
  container: 'tools',
  item: 'tool',
} as const;

/** Tool identifier of the clang static analyzer. */
export const CLANG_ANALYZER = 'clang-analyzer';

/** Tool identifier of clang-tidy. */
export const CLANG_TIDY = 'clang-tidy';

/**
 * How the value of a list item is stored.
 * - `attribute`: in the named attribute of the item element
 * - `text`: as the text content of the item element
 */
export type ListItemStyle =
  | { readonly kind: 'attribute'; readonly attribute: string }
  | { readonly kind: 'text' };

/**
 * One list-valued setting and its element names.
 */
export interface LabeledList {
  /** Model field the items are stored in. */
  readonly field: ProjectListField;
  /** Container element name. */
  readonly container: string;
  /** Item element name. */
  readonly item: string;
  /** Where each item keeps its value. */
  readonly style: ListItemStyle;
  /** Deprecated spelling: accepted on read, never written. */
  readonly legacy: boolean;
}

const byName = { kind: 'attribute', attribute: 'name' } as const;
const asText = { kind: 'text' } as const;

/**
 * List-valued settings and their element names.
 *
 * `ignore` is the deprecated spelling of `exclude`; both feed `excludedPaths`.
 */
export const LABELED_LISTS: readonly LabeledList[] = [
  { field: 'includeDirs', container: 'includedir', item: 'dir', style: byName, legacy: false },
  { field: 'defines', container: 'defines', item: 'define', style: byName, legacy: false },
  { field: 'undefines', container: 'undefines', item: 'undefine', style: asText, legacy: false },
  { field: 'checkPaths', container: 'paths', item: 'dir', style: byName, legacy: false },
  { field: 'excludedPaths', container: 'exclude', item: 'path', style: byName, legacy: false },
  { field: 'excludedPaths', container: 'ignore', item: 'path', style: byName, legacy: true },
  { field: 'libraries', container: 'libraries', item: 'library', style: asText, legacy: false },
  { field: 'addons', container: 'addons', item: 'addon', style: asText, legacy: false },
  { field: 'tags', container: 'tags', item: 'tag', style: asText, legacy: false },
];

/**
 * Finds the list entry recognized for a container element name.
 *
 * @param container - Element name found under the root element.
 * @returns The matching entry, or undefined for any other element.
 */
export function findLabeledList(container: string): LabeledList | undefined {
  return LABELED_LISTS.find((list) => list.container === container);
}

/**
 * Returns the entry the writer uses for a list field.
 *
 * @param field - Model field.
 * @returns The non-legacy entry for the field.
 */
export function canonicalList(field: ProjectListField): LabeledList {
  const list = LABELED_LISTS.find((entry) => entry.field === field && !entry.legacy);
  if (list === undefined) {
    throw new Error(`No canonical element is defined for list field '${field}'`);
  }
  return list;
}

/**
 * Sections of the document in the order the writer emits them.
 */
export type ProjectSection =
  | { readonly kind: 'scalar'; readonly field: keyof typeof SCALAR_ELEMENTS }
  | { readonly kind: 'list'; readonly field: ProjectListField }
  | { readonly kind: 'suppressions' }
  | { readonly kind: 'tools' };

/**
 * Canonical element order of a written document.
 */
export const WRITE_ORDER: readonly ProjectSection[] = [
  { kind: 'scalar', field: 'rootPath' },
  { kind: 'scalar', field: 'buildDir' },
  { kind: 'scalar', field: 'platform' },
  { kind: 'scalar', field: 'importProject' },
  { kind: 'scalar', field: 'analyzeAllVsConfigs' },
  { kind: 'list', field: 'includeDirs' },
  { kind: 'list', field: 'defines' },
  { kind: 'list', field: 'undefines' },
  { kind: 'list', field: 'checkPaths' },
  { kind: 'list', field: 'excludedPaths' },
  { kind: 'list', field: 'libraries' },
  { kind: 'suppressions' },
  { kind: 'list', field: 'addons' },
  { kind: 'tools' },
  { kind: 'list', field: 'tags' },
];
