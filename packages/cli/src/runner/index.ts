export {
  executeRun,
  runSuites,
  type RunDependencies,
  type RunSettings,
  type SuiteRun,
} from './executor.js';
export {
  collectSuites,
  DEFAULT_PATTERN,
  discoverModules,
  loadSuites,
  ModuleLoadError,
  type LoadedSuite,
  type ModuleImporter,
} from './loader.js';
export { formatDuration, formatSummary, getExitCode, type SummaryOptions } from './summary.js';
