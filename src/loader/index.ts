/**
 * Loader module: parse sources, merge them and decode.
 *
 * @packageDocumentation
 */

export { dumps } from './dump.js';
export type { DumpFormat } from './dump.js';
export { literalNode, readEnvTree } from './env.js';
export {
  SourceParseError,
  formatFromContentType,
  formatFromPath,
  parseSource,
} from './formats.js';
export {
  SourceChain,
  SourceFetchError,
  loadDict,
  loadEnv,
  loadFile,
  loadUrl,
  loads,
  multi,
} from './loader.js';
export type { Source } from './loader.js';
