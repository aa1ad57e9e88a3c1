/**
 * Identifies a manifest collection (`kind` + `group`) or, with `name`, a
 * single manifest inside it. An unset or empty `namespace` selects the
 * cluster-scoped layout.
 *
 * Example - all nodes:
 *   { kind: 'nodes', group: 'core' }
 * Example - one machine:
 *   { name: 'machine-0', namespace: 'openshift-machine-api', kind: 'machines', group: 'machine.openshift.io' }
 */
export interface ResourceLocator {
  name?: string;
  namespace?: string;
  kind: string;
  group: string;
}
