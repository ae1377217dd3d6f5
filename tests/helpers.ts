// Shared fixtures for the unit tests

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AppConfig, createConfig } from '../src/lib/environment-config';
import { Logger } from '../src/lib/error-handler';

export function silentLogger(): Logger {
  return new Logger({ enableConsole: false, enableFile: false });
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...createConfig(
      {
        sourceHost: 'source.local',
        sourcePassword: 'source-secret',
        destHost: 'dest.local',
        destPassword: 'dest-secret'
      },
      {}
    ),
    ...overrides
  };
}

export function makeTempDir(prefix: string = 'bulk-migrator-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
