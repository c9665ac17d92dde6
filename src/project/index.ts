/**
 * Project file store: reading, writing and editing analysis project settings.
 *
 * @packageDocumentation
 */

export { ProjectFile } from './project-file.js';
export type { ProjectFileOptions } from './project-file.js';
export { ProjectFileError } from './errors.js';
export type { ProjectFileErrorType } from './errors.js';
export { MAX_LINE_NUMBER, NO_LINE, isValidLineNumber } from './types.js';
export type { ProjectConfigData, ProjectListField, Suppression } from './types.js';
export { DEFAULT_PROJECT_CONFIG, createDefaultProjectConfig, createSuppression } from './defaults.js';
export { parseLineNumber, parseProjectDocument } from './reader.js';
export type { ReadOptions } from './reader.js';
export { XML_DECLARATION, serializeProjectDocument, toolNames } from './writer.js';
export type { WriteOptions } from './writer.js';
export {
  loadProjectFile,
  readProjectDocument,
  saveProjectFile,
  writeProjectDocument,
} from './persistence.js';
export { isPlatformFile, toForwardSlashes, toForwardSlashesAll } from './paths.js';
export {
  BYTE_ORDER_MARK,
  CLANG_ANALYZER,
  CLANG_TIDY,
  LABELED_LISTS,
  PROJECT_ELEMENT,
  PROJECT_FILE_VERSION,
  WRITE_ORDER,
} from './schema.js';
export type { LabeledList, ListItemStyle, ProjectSection } from './schema.js';
