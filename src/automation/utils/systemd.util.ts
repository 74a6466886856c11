export interface SystemdUnitOptions {
  execStart: string;
  workingDirectory: string;
  description?: string;
  user?: string;
  environment?: Record<string, string>;
}

export function systemdUnitPath(serviceName: string): string {
  return `/etc/systemd/system/${serviceName}.service`;
}

/** Unit file for a long-running service that restarts on exit. */
export function renderSystemdUnit(options: SystemdUnitOptions): string {
  const environment = Object
    .entries({ NODE_ENV: 'production', ...options.environment })
    .map(
    ([key, value]) => `Environment="${key}=${value}"`,
  );
  return [
    '[Unit]',
    `Description=${options.description ?? 'Newsletter Engine automation service'}`,
    'After=network.target',
    '',
    '[Service]',
    'Type=simple',
    `User=${options.user ?? 'www-data'}`,
    `WorkingDirectory=${options.workingDirectory}`,
    `ExecStart=${options.execStart}`,
    'Restart=always',
    'RestartSec=10',
    ...environment,
    'StandardOutput=journal',
    'StandardError=journal',
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    '',
  ].join('\n');
}
