import { Node, NodeDecodeError } from './node';
import { lookup, type DocumentKey, type StructuredDocument } from './resource-manifest';

function documentOf(content: unknown, source = 'nodes/test.yaml'): StructuredDocument {
  return {
    source,
    get: (...keys: DocumentKey[]) => lookup(content, keys),
    getString: (...keys: DocumentKey[]) => {
      const value = lookup(content, keys);
      return typeof value === 'string' ? value : undefined;
    },
  };
}

describe('Node', () => {
  it('should decode name, labels and roles', () => {
    const node = Node.from(
      documentOf({
        kind: 'Node',
        metadata: {
          name: 'worker-0',
          creationTimestamp: '2022-03-01T10:00:00Z',
          labels: {
            'kubernetes.io/hostname': 'worker-0',
            'node-role.kubernetes.io/worker': '',
            'node-role.kubernetes.io/infra': null,
          },
        },
      }),
    );

    expect(node.name).toBe('worker-0');
    expect(node.creationTimestamp).toBe('2022-03-01T10:00:00Z');
    expect(node.roles).toEqual(['infra', 'worker']);
    expect(node.labels).toEqual({
      'kubernetes.io/hostname': 'worker-0',
      'node-role.kubernetes.io/worker': '',
      'node-role.kubernetes.io/infra': '',
    });
  });

  it('should read the Ready condition', () => {
    const conditions = (status: string) => ({
      metadata: { name: 'n' },
      status: {
        conditions: [
          { type: 'MemoryPressure', status: 'False' },
          { type: 'Ready', status },
        ],
      },
    });

    expect(Node.from(documentOf(conditions('True'))).ready).toBe(true);
    expect(Node.from(documentOf(conditions('Unknown'))).ready).toBe(false);
    expect(Node.from(documentOf({ metadata: { name: 'n' } })).ready).toBeUndefined();
  });

  it('should decode node info and addresses', () => {
    const node = Node.from(
      documentOf({
        metadata: { name: 'master-0' },
        status: {
          nodeInfo: {
            kubeletVersion: 'v1.23.5',
            osImage: 'Test OS 1.0',
            architecture: 'amd64',
          },
          addresses: [
            { type: 'InternalIP', address: '10.0.0.5' },
            { type: 'Hostname' },
            { type: 'Hostname', address: 'master-0' },
          ],
        },
      }),
    );

    expect(node.kubeletVersion).toBe('v1.23.5');
    expect(node.osImage).toBe('Test OS 1.0');
    expect(node.architecture).toBe('amd64');
    expect(node.addresses).toEqual([
      { type: 'InternalIP', address: '10.0.0.5' },
      { type: 'Hostname', address: 'master-0' },
    ]);
    expect(node.roles).toEqual([]);
  });

  it('should reject a manifest without a name', () => {
    const decode = () => Node.from(documentOf({ kind: 'Node', metadata: {} }));
    expect(decode).toThrow(NodeDecodeError);
    expect(decode).toThrow('Cannot decode Node from nodes/test.yaml: metadata.name is missing');
  });

  it('should reject a manifest of another kind', () => {
    expect(() => Node.from(documentOf({ kind: 'Pod', metadata: { name: 'p' } }))).toThrow(
      'Cannot decode Node from nodes/test.yaml: unexpected kind "Pod"',
    );
  });
});
