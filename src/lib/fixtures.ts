/**
 * Fixture workspace
 *
 * A catalog entry is a directory holding exactly one StepAction YAML file and
 * a `tests/` directory of test manifests. Each test works on a temporary copy
 * so names can be rewritten without touching the catalog.
 */

import { copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { glob } from 'glob';
import { customAlphabet } from 'nanoid';
import { FixtureError } from './errors';
import { metadataName, parseManifest, suffixStepAction, suffixTestManifest } from './manifest-rewriter';

/**
 * Random suffix such as "abc12"
 */
export const generateSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 5);

export async function findStepActionFile(dir: string): Promise<string> {
  const files = (await glob('*.yaml', { cwd: dir, absolute: true, nodir: true })).sort();
  const [file] = files;
  if (!file) {
    throw new FixtureError(`no YAML file found in ${dir}`, { dir });
  }
  if (files.length > 1) {
    throw new FixtureError(`multiple YAML files found in ${dir}`, { dir, files });
  }
  return file;
}

export async function findTestFiles(dir: string): Promise<string[]> {
  return (await glob('tests/*.yaml', { cwd: dir, absolute: true, nodir: true })).sort();
}

export interface FixtureWorkspace {
  root: string;
  stepActionFile: string;
  /** metadata.name of the StepAction as applied, suffix included */
  stepActionName: string;
  testFiles: string[];
  suffix?: string;
  dispose: () => Promise<void>;
}

export interface PrepareWorkspaceOptions {
  suffix?: string;
  /** Only copy these test files (absolute paths inside `srcDir/tests`) */
  testFiles?: readonly string[];
  tempRoot?: string;
}

/**
 * Copy a catalog entry into a fresh temporary directory, suffixing names when asked
 */
export async function prepareWorkspace(
  srcDir: string,
  options: PrepareWorkspaceOptions = {},
): Promise<FixtureWorkspace> {
  const srcStepActionFile = await findStepActionFile(srcDir);
  const srcTestFiles = options.testFiles ?? (await findTestFiles(srcDir));
  const root = await mkdtemp(path.join(options.tempRoot ?? tmpdir(), 'catalog-e2e-'));
  const dispose = (): Promise<void> => rm(root, { recursive: true, force: true });

  try {
    const stepActionFile = path.join(root, path.basename(srcStepActionFile));
    const testsDir = path.join(root, 'tests');
    await mkdir(testsDir, { recursive: true });

    let stepActionText = await readFile(srcStepActionFile, 'utf-8');
    const testFiles: string[] = [];

    if (options.suffix) {
      const suffixed = suffixStepAction(stepActionText, options.suffix);
      stepActionText = suffixed.text;
      await writeFile(stepActionFile, stepActionText);

      for (const srcTestFile of srcTestFiles) {
        const dstTestFile = path.join(testsDir, path.basename(srcTestFile));
        const text = await readFile(srcTestFile, 'utf-8');
        await writeFile(dstTestFile, suffixTestManifest(text, suffixed.originalNames, options.suffix));
        testFiles.push(dstTestFile);
      }
    } else {
      await copyFile(srcStepActionFile, stepActionFile);
      for (const srcTestFile of srcTestFiles) {
        const dstTestFile = path.join(testsDir, path.basename(srcTestFile));
        await copyFile(srcTestFile, dstTestFile);
        testFiles.push(dstTestFile);
      }
    }

    const [stepAction] = parseManifest(stepActionText);
    const stepActionName =
      (stepAction && metadataName(stepAction)) ?? path.basename(stepActionFile, '.yaml');

    return {
      root,
      stepActionFile,
      stepActionName,
      testFiles,
      ...(options.suffix ? { suffix: options.suffix } : {}),
      dispose,
    };
  } catch (error) {
    await dispose();
    throw error;
  }
}
