import { Node, lookup, type DocumentKey, type StructuredDocument } from '@mgscope/sdk';
import { createLogger } from './logger';
import { renderSummary, resourceNames } from './render';

const plain = createLogger(false, false);

function documentOf(content: unknown): StructuredDocument {
  return {
    source: 'test.yaml',
    get: (...keys: DocumentKey[]) => lookup(content, keys),
    getString: (...keys: DocumentKey[]) => {
      const value = lookup(content, keys);
      return typeof value === 'string' ? value : undefined;
    },
  };
}

describe('renderSummary', () => {
  it('should render the header and a node table sorted by name', () => {
    const nodes = [
      new Node({
        name: 'b-node',
        labels: { 'node-role.kubernetes.io/worker': '' },
        kubeletVersion: 'v1.23.5',
        ready: true,
      }),
      new Node({ name: 'a-node', labels: { 'node-role.kubernetes.io/master': '' } }),
    ];

    expect(renderSummary({ title: 'must-gather', version: '4.10.3', nodes }, [], plain)).toBe(
      [
        'Must-gather: must-gather',
        'Version:     4.10.3',
        'Nodes:       2',
        '',
        '  NAME    ROLES   KUBELET  STATUS',
        '  a-node  master  -' + ' '.repeat(8) + 'Unknown',
        '  b-node  worker  v1.23.5  Ready',
      ].join('\n'),
    );
  });

  it('should list skipped manifests and omit the table without nodes', () => {
    const output = renderSummary(
      { title: 'mg', version: 'Unknown', nodes: [] },
      [{ path: '/mg/nodes/bad.yaml', reason: 'broken' }],
      plain,
    );
    expect(output).toBe(
      [
        'Must-gather: mg',
        'Version:     Unknown',
        'Nodes:       0',
        '',
        'Skipped manifests: 1',
        '  /mg/nodes/bad.yaml: broken',
      ].join('\n'),
    );
  });

  it('should mark nodes that are not ready', () => {
    const output = renderSummary(
      { title: 'mg', version: '4.10.3', nodes: [new Node({ name: 'n', ready: false })] },
      [],
      plain,
    );
    expect(output.split('\n')[5]).toBe('  n     <none>  -' + ' '.repeat(8) + 'NotReady');
  });

  it('should colour statuses when colour is enabled', () => {
    const coloured = createLogger(false, true);
    const output = renderSummary(
      { title: 'mg', version: '4.10.3', nodes: [new Node({ name: 'n', ready: true })] },
      [],
      coloured,
    );
    expect(output.endsWith('\x1b[32mReady\x1b[0m')).toBe(true);
  });
});

describe('resourceNames', () => {
  it('should qualify namespaced resources and sort them', () => {
    expect(
      resourceNames([
        documentOf({ metadata: { name: 'web', namespace: 'shop' } }),
        documentOf({ metadata: { name: 'api', namespace: 'shop' } }),
        documentOf({ metadata: { name: 'node1' } }),
        documentOf({ metadata: {} }),
      ]),
    ).toEqual(['<unnamed>', 'node1', 'shop/api', 'shop/web']);
  });
});
