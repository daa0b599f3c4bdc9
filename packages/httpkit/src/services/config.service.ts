import { config } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Nearest ancestor holding a package.json that declares npm workspaces, else the nearest package.json. */
function findRootDir(): string {
  let current = dirname(fileURLToPath(import.meta.url));
  let nearest: string | undefined;

  while (true) {
    const pkgFile = join(current, 'package.json');

    if (existsSync(pkgFile)) {
      nearest ??= current;

      try {
        const pkg: unknown = JSON.parse(readFileSync(pkgFile, { encoding: 'utf-8' }));

        if (pkg && typeof pkg === 'object' && 'workspaces' in pkg) {
          return current;
        }
      }
      catch {
        /* unreadable package.json, keep walking */
      }
    }

    const parent = resolve(current, '..');

    if (parent === current) {
      return nearest ?? current;
    }

    current = parent;
  }
}

let rootDir = findRootDir();
const defaultEnvFiles = ['.env'];

export namespace ConfigService {
  export const getDirname = (importMetaUrl: string) => {
    const __filename = fileURLToPath(importMetaUrl);
    return dirname(__filename);
  };

  export function setRootDir(dir: string): void {
    rootDir = resolve(dir);
  }

  export function getRootDir(): string {
    return rootDir;
  }

  export function resolveFromRootDir(...segments: string[]): string {
    return resolve(rootDir, ...segments);
  }

  export function env(field: string): string | undefined;
  export function env(field: string, defaultValue: string): string;
  export function env(field: string, defaultValue?: string): string | undefined {
    const value = process.env[field];
    return value === undefined || value === '' ? defaultValue : value;
  }

  export function envNumber(field: string, defaultValue: number): number {
    const raw = env(field);
    const value = Number(raw);
    return raw !== undefined && Number.isFinite(value) ? value : defaultValue;
  }

  export function envFlag(field: string, defaultValue = false): boolean {
    const value = env(field);

    if (value === undefined) {
      return defaultValue;
    }

    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
  }

  export function loadEnv(envFiles: string[] = defaultEnvFiles): void {
    const files = envFiles.map((file) => resolve(rootDir, file));

    for (const file of files) {
      if (existsSync(file)) {
        config({ path: file, encoding: 'utf8', override: false });
      }
    }
  }
}
