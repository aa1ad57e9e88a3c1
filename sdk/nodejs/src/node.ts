import { isMapping, type StructuredDocument } from './resource-manifest';

const ROLE_LABEL_PREFIX = 'node-role.kubernetes.io/';

export interface NodeAddress {
  type: string;
  address: string;
}

export interface NodeInit {
  name: string;
  labels?: Record<string, string>;
  ready?: boolean;
  kubeletVersion?: string;
  osImage?: string;
  architecture?: string;
  creationTimestamp?: string;
  addresses?: NodeAddress[];
}

export class NodeDecodeError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
  ) {
    super(`Cannot decode Node from ${source}: ${reason}`);
    this.name = 'NodeDecodeError';
  }
}

/**
 * A cluster node as recorded in `cluster-scoped-resources/core/nodes`.
 */
export class Node {
  readonly name: string;
  readonly labels: Record<string, string>;
  /** Role names taken from `node-role.kubernetes.io/<role>` labels, sorted */
  readonly roles: string[];
  /** Status of the `Ready` condition; undefined when the node reports none */
  readonly ready: boolean | undefined;
  readonly kubeletVersion: string | undefined;
  readonly osImage: string | undefined;
  readonly architecture: string | undefined;
  readonly creationTimestamp: string | undefined;
  readonly addresses: NodeAddress[];

  constructor(init: NodeInit) {
    this.name = init.name;
    this.labels = init.labels ?? {};
    this.roles = Object.keys(this.labels)
      .filter((key) => key.startsWith(ROLE_LABEL_PREFIX))
      .map((key) => key.slice(ROLE_LABEL_PREFIX.length))
      .filter((role) => role.length > 0)
      .sort();
    this.ready = init.ready;
    this.kubeletVersion = init.kubeletVersion;
    this.osImage = init.osImage;
    this.architecture = init.architecture;
    this.creationTimestamp = init.creationTimestamp;
    this.addresses = init.addresses ?? [];
  }

  static from(document: StructuredDocument): Node {
    const kind = document.get('kind');
    if (kind !== undefined && kind !== 'Node') {
      throw new NodeDecodeError(document.source, `unexpected kind ${JSON.stringify(kind)}`);
    }
    const name = document.getString('metadata', 'name');
    if (!name) {
      throw new NodeDecodeError(document.source, 'metadata.name is missing');
    }

    return new Node({
      name,
      labels: stringEntries(document.get('metadata', 'labels')),
      ready: readyCondition(document.get('status', 'conditions')),
      kubeletVersion: document.getString('status', 'nodeInfo', 'kubeletVersion'),
      osImage: document.getString('status', 'nodeInfo', 'osImage'),
      architecture: document.getString('status', 'nodeInfo', 'architecture'),
      creationTimestamp: document.getString('metadata', 'creationTimestamp'),
      addresses: nodeAddresses(document.get('status', 'addresses')),
    });
  }
}

function stringEntries(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isMapping(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    // role labels are usually empty strings; YAML may also leave them null
    if (typeof entry === 'string') {
      result[key] = entry;
    } else if (entry === null) {
      result[key] = '';
    }
  }
  return result;
}

function readyCondition(value: unknown): boolean | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  for (const condition of value) {
    if (isMapping(condition) && condition.type === 'Ready') {
      return condition.status === 'True';
    }
  }
  return undefined;
}

function nodeAddresses(value: unknown): NodeAddress[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const addresses: NodeAddress[] = [];
  for (const entry of value) {
    if (isMapping(entry) && typeof entry.type === 'string' && typeof entry.address === 'string') {
      addresses.push({ type: entry.type, address: entry.address });
    }
  }
  return addresses;
}
