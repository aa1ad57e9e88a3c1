import type { ArchiveSummary, Node, SkippedManifest, StructuredDocument } from '@mgscope/sdk';
import type { Palette } from './logger';

function nodeStatus(node: Node, palette: Palette): string {
  if (node.ready === undefined) {
    return palette.dim('Unknown');
  }
  return node.ready ? palette.ok('Ready') : palette.error('NotReady');
}

/**
 * Lay out rows as left-aligned columns. The last column is not padded so
 * it may carry colour codes.
 */
function table(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map(
    (row) =>
      '  ' + row.map((cell, index) => (index < row.length - 1 ? cell.padEnd(widths[index]) : cell)).join('  '),
  );
}

export function renderSummary(
  summary: ArchiveSummary,
  skipped: SkippedManifest[],
  palette: Palette,
): string {
  const lines = [
    `Must-gather: ${summary.title}`,
    `Version:     ${summary.version}`,
    `Nodes:       ${summary.nodes.length}`,
  ];

  if (summary.nodes.length > 0) {
    const nodes = [...summary.nodes].sort((a, b) => a.name.localeCompare(b.name));
    const rows = nodes.map((node) => [
      node.name,
      node.roles.length > 0 ? node.roles.join(',') : '<none>',
      node.kubeletVersion ?? '-',
      '',
    ]);
    const laidOut = table([['NAME', 'ROLES', 'KUBELET', 'STATUS'], ...rows]);
    lines.push('', laidOut[0]);
    nodes.forEach((node, index) => {
      lines.push(laidOut[index + 1] + nodeStatus(node, palette));
    });
  }

  if (skipped.length > 0) {
    lines.push('', palette.warn(`Skipped manifests: ${skipped.length}`));
    for (const entry of skipped) {
      lines.push(`  ${palette.dim(entry.path)}: ${entry.reason}`);
    }
  }

  return lines.join('\n');
}

/** `namespace/name` (or just `name` for cluster-scoped manifests), sorted */
export function resourceNames(documents: StructuredDocument[]): string[] {
  return documents
    .map((document) => {
      const name = document.getString('metadata', 'name') ?? '<unnamed>';
      const namespace = document.getString('metadata', 'namespace');
      return namespace ? `${namespace}/${name}` : name;
    })
    .sort();
}
