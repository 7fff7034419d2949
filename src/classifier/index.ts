/**
 * Source classifier: splits generated code into production and test
 * lines per language and reads dependency counts from manifests.
 */

export {
  Language,
  PROFILES,
  SUPPORTED_LANGUAGES,
  resolveProfile,
  countCStyleLines,
  countPythonLines,
  splitRustLines,
  type LocCount,
  type LanguageProfile,
} from './profiles.js';

export {
  classify,
  classifyDirectory,
  type FileClassification,
  type DirectoryClassification,
} from './classifier.js';

export {
  countExternalDependencies,
  countCargoDependencies,
  countGoModDependencies,
  countGradleDependencies,
  countPomDependencies,
  countRequirementsDependencies,
  countPyprojectDependencies,
} from './dependencies.js';

export { measureCodeMetrics, maintainabilityIndex } from './code-metrics.js';

export { UnsupportedLanguageError } from './errors.js';
