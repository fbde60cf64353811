import type { ServiceStatus } from './supervisor';

const COLUMNS = [ 'SERVICE', 'CONTAINER', 'STATE', 'HEALTH', 'RESTARTS', 'PORTS' ] as const;

const cells = (row: ServiceStatus): string[] => [
  row.service,
  row.container,
  row.state === 'exited' || row.state === 'failed' ? `${row.state} (${row.exitCode ?? -1})` : row.state,
  row.health === 'none' ? '-' : row.health,
  String(row.restarts),
  row.ports.join(', '),
];

/**
 * Plain-text table for `ps`. Columns are padded to their widest cell and
 * separated by three spaces; trailing whitespace is trimmed.
 */
export const formatStatusTable = (rows: ServiceStatus[]): string => {
  const table = [ [ ...COLUMNS ], ...rows.map(cells) ];
  const widths = COLUMNS.map((_, column) => Math.max(...table.map(line => line[column]?.length ?? 0)));

  return table
    .map(line => line.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('   ').trimEnd())
    .join('\n') + '\n';
};
