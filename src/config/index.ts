export {
  loadConfig,
  parseConfig,
  CONFIG_FILENAME,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './loader.js';
export {
  parseCases,
  loadCaseFile,
  findCaseFiles,
  filterByCategory,
  DEFAULT_CASE_PATTERNS,
  type LoadCasesResult,
} from './case-loader.js';
export { interpolate, interpolateValue, type Environment } from './interpolate.js';
