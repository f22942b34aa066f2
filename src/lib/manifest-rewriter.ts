/**
 * Manifest Rewriter
 *
 * Renames fixtures for uniqueness and adapts run documents for the managed
 * runs API. Works on multi-document YAML text.
 *
 * Invariant: a name that gets suffixed is suffixed everywhere it is referenced
 * (`ref.name`, `taskRef.name`, `pipelineRef.name`) within the fixture set.
 */

import * as yaml from 'js-yaml';
import { toRunKind, type RunKind } from '../domain/types';
import { FixtureError } from './errors';

type YamlRecord = Record<string, unknown>;

const REFERENCE_KEYS = ['ref', 'taskRef', 'pipelineRef'] as const;
const DEFINITION_KINDS = new Set(['StepAction', 'Task', 'Pipeline']);

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseManifest(text: string): YamlRecord[] {
  return yaml.loadAll(text).filter(isRecord);
}

export function serializeManifest(documents: readonly YamlRecord[]): string {
  return documents.map((doc) => yaml.dump(doc, { lineWidth: -1, noRefs: true })).join('---\n');
}

export function metadataName(doc: YamlRecord): string | undefined {
  const metadata = doc.metadata;
  return isRecord(metadata) && typeof metadata.name === 'string' ? metadata.name : undefined;
}

function renameDocument(doc: YamlRecord, suffix: string): string | undefined {
  const name = metadataName(doc);
  if (name !== undefined && isRecord(doc.metadata)) {
    doc.metadata.name = `${name}-${suffix}`;
  }
  return name;
}

function renameReferences(node: unknown, names: ReadonlySet<string>, suffix: string): void {
  if (Array.isArray(node)) {
    node.forEach((item) => renameReferences(item, names, suffix));
    return;
  }
  if (!isRecord(node)) return;

  for (const key of REFERENCE_KEYS) {
    const ref = node[key];
    if (isRecord(ref) && typeof ref.name === 'string' && names.has(ref.name)) {
      ref.name = `${ref.name}-${suffix}`;
    }
  }
  for (const value of Object.values(node)) {
    renameReferences(value, names, suffix);
  }
}

export interface SuffixedStepAction {
  text: string;
  /** metadata.name values before suffixing */
  originalNames: string[];
}

/**
 * Append `-suffix` to metadata.name of every document
 */
export function suffixStepAction(text: string, suffix: string): SuffixedStepAction {
  const documents = parseManifest(text);
  const originalNames = documents
    .map((doc) => renameDocument(doc, suffix))
    .filter((name): name is string => name !== undefined);
  return { text: serializeManifest(documents), originalNames };
}

/**
 * Append `-suffix` to every document name in a test manifest and to every
 * reference naming either an already renamed resource or a Task/Pipeline
 * defined in the same file.
 */
export function suffixTestManifest(
  text: string,
  renamed: Iterable<string>,
  suffix: string,
): string {
  const documents = parseManifest(text);
  const names = new Set(renamed);

  for (const doc of documents) {
    const name = metadataName(doc);
    if (name !== undefined && typeof doc.kind === 'string' && DEFINITION_KINDS.has(doc.kind)) {
      names.add(name);
    }
  }

  for (const doc of documents) {
    renameReferences(doc, names, suffix);
    renameDocument(doc, suffix);
  }

  return serializeManifest(documents);
}

export interface BundleSource {
  /** OCI reference the StepAction was pushed to */
  ref: string;
  stepActionName: string;
}

export interface ManagedManifestOptions {
  /** Final run name, unique per scope */
  name: string;
  serviceAccount: string;
  /** Point step references at this bundle instead of the cluster */
  bundle?: BundleSource;
}

/**
 * Replace every step `ref: { name }` naming the StepAction with a bundles resolver reference
 */
function resolveFromBundle(node: unknown, bundle: BundleSource): void {
  if (Array.isArray(node)) {
    node.forEach((item) => resolveFromBundle(item, bundle));
    return;
  }
  if (!isRecord(node)) return;

  const ref = node.ref;
  if (isRecord(ref) && ref.name === bundle.stepActionName) {
    node.ref = {
      resolver: 'bundles',
      params: [
        { name: 'bundle', value: bundle.ref },
        { name: 'name', value: bundle.stepActionName },
        { name: 'kind', value: 'stepaction' },
      ],
    };
  }
  for (const value of Object.values(node)) {
    resolveFromBundle(value, bundle);
  }
}

export interface ManagedManifest {
  text: string;
  kind: RunKind;
  name: string;
}

/**
 * Adapt the run document of a test manifest for the managed runs API:
 * fixed unique name, service account injected when absent, workspaces
 * reduced to the first one's name and, given a bundle, StepAction references
 * resolved from it.
 */
export function prepareManagedManifest(
  text: string,
  options: ManagedManifestOptions,
): ManagedManifest {
  const documents = parseManifest(text);
  let target: { doc: YamlRecord; kind: RunKind } | undefined;
  for (const candidate of documents) {
    const kind = typeof candidate.kind === 'string' ? toRunKind(candidate.kind) : undefined;
    if (kind) {
      target = { doc: candidate, kind };
      break;
    }
  }

  if (!target) {
    throw new FixtureError('no TaskRun or PipelineRun document found in the test manifest');
  }

  const { doc, kind } = target;
  const metadata: YamlRecord = isRecord(doc.metadata) ? doc.metadata : {};
  delete metadata.generateName;
  metadata.name = options.name;
  doc.metadata = metadata;

  const spec: YamlRecord = isRecord(doc.spec) ? doc.spec : {};
  const security: YamlRecord = isRecord(spec.security) ? spec.security : {};
  if (typeof security.serviceAccount !== 'string' || security.serviceAccount === '') {
    security.serviceAccount = options.serviceAccount;
  }
  spec.security = security;

  if (Array.isArray(spec.workspaces) && spec.workspaces.length > 0) {
    const [first] = spec.workspaces;
    if (isRecord(first) && typeof first.name === 'string') {
      spec.workspaces = [{ name: first.name }];
    }
  }
  doc.spec = spec;

  if (options.bundle) {
    resolveFromBundle(spec, options.bundle);
  }

  return { text: serializeManifest([doc]), kind, name: options.name };
}
