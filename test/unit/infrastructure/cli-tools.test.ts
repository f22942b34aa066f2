import { describe, it, expect, beforeEach } from '@jest/globals';
import { Gcloud } from '../../../src/infrastructure/cli/gcloud';
import { Kubectl } from '../../../src/infrastructure/cli/kubectl';
import { Tkn } from '../../../src/infrastructure/cli/tkn';
import { YqFieldExtractor } from '../../../src/infrastructure/cli/yq';
import { CommandFailedError } from '../../../src/lib/errors';
import { ScriptedRunner } from '../../__support__/utilities/mock-infrastructure';

describe('tool wrappers', () => {
  let runner: ScriptedRunner;

  beforeEach(() => {
    runner = new ScriptedRunner();
  });

  describe('YqFieldExtractor', () => {
    it('evaluates the expression against the document on stdin', async () => {
      runner.on('yq eval', { stdout: 'Succeeded\n' });
      const extractor = new YqFieldExtractor(runner, 'yq', 1000);

      await expect(
        extractor.extractField('status:\n  conditions: []\n', '.status.conditions[0].reason'),
      ).resolves.toBe('Succeeded');
      expect(runner.calls[0]?.args).toEqual(['eval', '.status.conditions[0].reason', '-']);
      expect(runner.calls[0]?.options).toEqual({ stdin: 'status:\n  conditions: []\n', timeout: 1000 });
    });

    it('propagates yq diagnostics', async () => {
      runner.on('yq eval', { exitCode: 1, stderr: "Error: '[' expects ']'" });
      const extractor = new YqFieldExtractor(runner);

      await expect(extractor.extractField('{}', '.a[')).rejects.toThrow(CommandFailedError);
      await expect(extractor.extractField('{}', '.a[')).rejects.toThrow("yq eval .a[ - exited with code 1\nError: '[' expects ']'");
    });
  });

  describe('Kubectl', () => {
    it('passes the kubeconfig first when one is configured', async () => {
      const kubectl = new Kubectl(runner, { binary: 'kubectl', kubeconfig: '/etc/kube', timeout: 1000 });
      await kubectl.deleteNamespace('scope-1');
      expect(runner.lines).toEqual(['kubectl --kubeconfig /etc/kube delete namespace scope-1']);
    });

    it('caps log retrieval at the log timeout', async () => {
      const kubectl = new Kubectl(runner, { binary: 'kubectl', timeout: 120000 });
      await kubectl.logs({ pod: 'echo-run-pod' }, 'scope-1');
      expect(runner.lines).toEqual(['kubectl logs echo-run-pod -n scope-1 --all-containers']);
      expect(runner.calls[0]?.options.timeout).toBe(30000);
    });

    it('uses plural resource names for runs', async () => {
      const kubectl = new Kubectl(runner, { binary: 'kubectl', timeout: 1000 });
      await kubectl.getYaml({ kind: 'PipelineRun', name: 'build-all' }, 'scope-1');
      expect(runner.lines).toEqual(['kubectl get pipelineruns/build-all -n scope-1 -o yaml']);
    });

    it('rounds the wait timeout up to whole seconds', async () => {
      const kubectl = new Kubectl(runner, { binary: 'kubectl', timeout: 1000 });
      await kubectl.wait({ kind: 'TaskRun', name: 'echo' }, 'ns', 'Succeeded', 1500);
      expect(runner.lines).toEqual(['kubectl wait --for=condition=Succeeded --timeout=2s taskruns/echo -n ns']);
    });
  });

  describe('Gcloud', () => {
    it('omits the project flag when no project is configured', async () => {
      const gcloud = new Gcloud(runner, { binary: 'gcloud', region: 'europe-west1', timeout: 1000 });
      await gcloud.applyRun('/work/run.managed.yaml');
      expect(runner.lines).toEqual(['gcloud builds runs apply --file=/work/run.managed.yaml --region=europe-west1']);
    });

    it('caps a describe call at the shorter of its own and the configured timeout', async () => {
      runner.on('runs describe', { stdout: '{}' });
      const gcloud = new Gcloud(runner, { binary: 'gcloud', region: 'europe-west1', timeout: 1000 });

      await gcloud.describeRun('run-1', { timeout: 250 });
      await gcloud.describeRun('run-1', { timeout: 5000 });
      await gcloud.describeRun('run-1');

      expect(runner.calls.map((call) => call.options.timeout)).toEqual([250, 1000, 1000]);
    });
  });

  describe('Tkn', () => {
    it('pushes a bundle from a file', async () => {
      const tkn = new Tkn(runner, { binary: '/opt/tkn', timeout: 1000 });
      await tkn.bundlePush('registry.test/catalog/echo:1', '/work/echo.yaml');
      expect(runner.lines).toEqual(['/opt/tkn bundle push registry.test/catalog/echo:1 -f /work/echo.yaml']);
    });
  });
});
