import { spawn as nodeSpawn, type SpawnOptions } from 'node:child_process';

interface Launcher {
  command: string;
  args: (url: string) => string[];
}

const LAUNCHERS: Partial<Record<NodeJS.Platform, Launcher>> = {
  darwin: { command: 'open', args: (url) => [url] },
  linux: { command: 'xdg-open', args: (url) => [url] },
  // `start` treats the first quoted argument as a window title.
  win32: { command: 'cmd', args: (url) => ['/c', 'start', '', url.replace(/&/g, '^&')] },
};

type Spawn = (command: string, args: readonly string[], options: SpawnOptions) => {
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  unref(): void;
};

export interface OpenBrowserOptions {
  platform?: NodeJS.Platform;
  spawn?: Spawn;
}

/** Launch the platform's default browser without waiting for it to exit. */
export function openBrowser(url: string, options: OpenBrowserOptions = {}): Promise<void> {
  const platform = options.platform ?? process.platform;
  const launcher = LAUNCHERS[platform];
  if (!launcher) {
    return Promise.reject(new Error(`unsupported platform: ${platform}`));
  }

  const spawn: Spawn = options.spawn ?? nodeSpawn;

  return new Promise<void>((resolve, reject) => {
    const child = spawn(launcher.command, launcher.args(url), {
      detached: true,
      stdio: 'ignore',
    });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
