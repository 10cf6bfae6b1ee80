import * as k8s from '@kubernetes/client-node';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidResourceError } from '../../src/core/errors.js';
import { KubernetesObjectClusterClient, withSignal } from '../../src/core/kubernetes/cluster-client.js';
import { configMap } from '../utils/fixtures.js';

function objectApi(): k8s.KubernetesObjectApi {
  const kc = new k8s.KubeConfig();
  kc.loadFromOptions({
    clusters: [{ name: 'test', server: 'https://127.0.0.1:6443', skipTLSVerify: false }],
    users: [{ name: 'test', token: 'test-token' }],
    contexts: [{ name: 'test', cluster: 'test', user: 'test' }],
    currentContext: 'test',
  });
  return kc.makeApiClient(k8s.KubernetesObjectApi);
}

describe('KubernetesObjectClusterClient', () => {
  let api: k8s.KubernetesObjectApi;
  let client: KubernetesObjectClusterClient;

  beforeEach(() => {
    api = objectApi();
    client = new KubernetesObjectClusterClient(api);
  });

  it('should read namespaced objects by their header', async () => {
    const read = vi.spyOn(api, 'read').mockResolvedValue(configMap('settings', 'ns-a', { mode: 'fast' }));

    const result = await client.get({ apiVersion: 'v1', kind: 'ConfigMap', namespace: 'ns-a', name: 'settings' });

    expect(result).toMatchObject({ data: { mode: 'fast' } });
    expect(read).toHaveBeenCalledWith({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: { name: 'settings', namespace: 'ns-a' },
    });
  });

  it('should leave the namespace out for cluster-scoped objects', async () => {
    const read = vi
      .spyOn(api, 'read')
      .mockResolvedValue({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'ns-a' } });

    await client.get({ apiVersion: 'v1', kind: 'Namespace', namespace: '', name: 'ns-a' });

    expect(read).toHaveBeenCalledWith({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'ns-a' } });
  });

  it('should reject responses that are not objects', async () => {
    vi.spyOn(api, 'read').mockResolvedValue({ kind: 'ConfigMap' });

    await expect(
      client.get({ apiVersion: 'v1', kind: 'ConfigMap', namespace: 'ns-a', name: 'settings' })
    ).rejects.toBeInstanceOf(InvalidResourceError);
  });

  it('should create, replace and delete through the object API', async () => {
    const settings = configMap('settings', 'ns-a', { mode: 'fast' });
    const create = vi.spyOn(api, 'create').mockResolvedValue(settings);
    const replace = vi.spyOn(api, 'replace').mockResolvedValue(settings);
    const remove = vi.spyOn(api, 'delete').mockResolvedValue({});

    await client.create(settings);
    await client.update(settings);
    await client.delete({ apiVersion: 'v1', kind: 'ConfigMap', namespace: 'ns-a', name: 'settings' });

    expect(create).toHaveBeenCalledWith(settings);
    expect(replace).toHaveBeenCalledWith(settings);
    expect(remove).toHaveBeenCalledWith({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: { name: 'settings', namespace: 'ns-a' },
    });
  });
});

describe('withSignal', () => {
  it('should settle with the request without a signal', async () => {
    await expect(withSignal(async () => 'done')).resolves.toBe('done');
  });

  it('should not start the request once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const request = vi.fn(async () => 'done');

    await expect(withSignal(request, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(request).not.toHaveBeenCalled();
  });

  it('should reject a pending request when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = withSignal(() => new Promise<string>(() => {}), controller.signal);

    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});
