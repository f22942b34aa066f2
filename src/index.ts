/**
 * tekton-catalog-e2e - programmatic API
 */

export { createContainer, type Deps, type DepsOverrides } from './app/container';
export { loadConfig, type HarnessConfig, type ConfigOverrides } from './config/app-config';

export * from './domain/types';
export type { StepResult, StepState, TektonRunObject } from './domain/tekton-schemas';
export * from './lib/errors';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';

export {
  CommandExecutor,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from './infrastructure/command-executor';
export { YqFieldExtractor, type FieldExtractor } from './infrastructure/cli/yq';
export type { KubernetesClient } from './infrastructure/kubernetes/client';

export { extractRunIdentifier, extractRunIdentifiers, findRunIdentifiers } from './lib/run-identifier';
export { findCondition, isRunDone, meetsCondition } from './lib/conditions';
export { FinalizerChain, type FinalizerReport } from './lib/finalizers';
export { findStepActionFile, findTestFiles, generateSuffix, prepareWorkspace } from './lib/fixtures';
export {
  assertFieldEquals,
  assertFieldNotEmpty,
  assertStepResultNotEmpty,
  checkFieldEquals,
  checkFieldNotEmpty,
  checkStepResults,
  type RunInspector,
} from './lib/assertions';

export { RunLifecycleController, type RunState } from './workflows/run-lifecycle';
export { ScopeManager, type ScopeHandle } from './workflows/scope-manager';
export { DirectStrategy, ManagedStrategy, createStrategy, type ExecutionStrategy } from './workflows/strategies';
export {
  runCatalog,
  runCatalogTest,
  type CatalogTestReport,
  type Expectations,
} from './workflows/catalog-test';
