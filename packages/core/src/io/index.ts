/**
 * File I/O Module
 */

export {
  readTextFile,
  writeTextFile,
  resolveImageExportPath,
  DEFAULT_IMAGE_EXTENSION,
} from './files';
export { importNativeFile, exportNativeFile } from './nativeFiles';
export type { NativeImportSummary } from './nativeFiles';
