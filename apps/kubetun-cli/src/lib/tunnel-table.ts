/**
 * Rows and table rendering for `kubetun tun list`
 */

import {
  formatIdForDisplay,
  type SshTunnelConfig,
  type TunnelRecord,
  type TunnelSpec,
  type TunnelState,
  type TunnelStatus,
} from '@kubetun/core';
import chalk from 'chalk';
import Table from 'cli-table3';

export interface TunnelRow {
  profile: string;
  configFile: string;
  id: string;
  status: TunnelState;
  proxy: string;
  forwardings: string;
}

/**
 * One `localhost:<port> → host:port` entry per forwarding; `?` for ports not
 * (or no longer) assigned
 *
 * @example
 * formatForwardings(spec, status) // => "localhost:10000 → 10.0.0.1:6443"
 */
export function formatForwardings(spec: TunnelSpec, status: TunnelStatus): string {
  return Object.entries(spec.forwardings)
    .map(([alias, forwarding]) => {
      const port = status.local_ports[alias] ?? '?';
      return `localhost:${port} → ${forwarding.host}:${forwarding.port}`;
    })
    .join(', ');
}

export function toTunnelRow([spec, status]: TunnelRecord): TunnelRow {
  return {
    profile: spec.locator.profile,
    configFile: spec.locator.config_file,
    id: status.id,
    status: status.status,
    proxy: `${spec.user}@${spec.host}`,
    forwardings: formatForwardings(spec, status),
  };
}

/**
 * Rows for the profiles of the current file: stored tunnels of that file plus
 * a `closed` row for each tunnel profile that has never been opened
 */
export function buildProfileRows(
  records: readonly TunnelRecord[],
  configFile: string,
  tunnelProfiles: ReadonlyArray<readonly [string, SshTunnelConfig]>
): TunnelRow[] {
  const rows = records
    .filter(([spec]) => spec.locator.config_file === configFile)
    .map(toTunnelRow);
  const known = new Set(rows.map((row) => row.profile));

  for (const [profile, tunnel] of tunnelProfiles) {
    if (known.has(profile)) continue;
    rows.push({
      profile,
      configFile,
      id: '',
      status: 'closed',
      proxy: `${tunnel.user}@${tunnel.host}`,
      forwardings: 'localhost:? → kubernetes API server',
    });
  }
  return sortRows(rows);
}

/**
 * Order by profile, then by configuration file
 */
export function sortRows(rows: TunnelRow[]): TunnelRow[] {
  return [...rows].sort(
    (a, b) => a.profile.localeCompare(b.profile) || a.configFile.localeCompare(b.configFile)
  );
}

function colorStatus(status: TunnelState): string {
  switch (status) {
    case 'open':
      return chalk.green(status);
    case 'broken':
      return chalk.red(status);
    case 'closed':
      return chalk.gray(status);
  }
}

export function renderTunnelTable(rows: readonly TunnelRow[], options: { showConfigFile?: boolean } = {}): string {
  const table = new Table({
    head: [
      chalk.cyan('Profile'),
      chalk.cyan('Tunnel ID'),
      chalk.cyan('Status'),
      chalk.cyan('Proxy'),
      chalk.cyan('Forwardings'),
    ],
    style: {
      head: [],
      border: [],
    },
  });

  for (const row of rows) {
    table.push([
      options.showConfigFile ? `${row.profile} ${chalk.gray(`(${row.configFile})`)}` : row.profile,
      chalk.gray(formatIdForDisplay(row.id)),
      colorStatus(row.status),
      row.proxy,
      row.forwardings,
    ]);
  }
  return table.toString();
}
