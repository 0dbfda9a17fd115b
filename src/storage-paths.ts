import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';

export interface StoragePathEnv {
  COHORT_REGISTRY_HOME?: string;
  HOME?: string;
}

const DEFAULT_HOME_DIRNAME = '.cohort-registry';

function normalize(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function resolveSystemHomeDirectory(env: StoragePathEnv, osHome?: string): string {
  const envHome = normalize(env.HOME);
  if (envHome && envHome !== '~') {
    return envHome;
  }

  const detectedHome = normalize(osHome ?? homedir());
  if (detectedHome) {
    return detectedHome;
  }

  throw new Error(
    'Unable to resolve user home directory. Set COHORT_REGISTRY_HOME to an absolute path.'
  );
}

function expandTilde(pathValue: string, env: StoragePathEnv, osHome?: string): string {
  if (!pathValue.startsWith('~')) {
    return pathValue;
  }

  const home = resolveSystemHomeDirectory(env, osHome);
  if (pathValue === '~') {
    return home;
  }

  if (pathValue.startsWith('~/')) {
    return join(home, pathValue.slice(2));
  }

  throw new Error(
    `Invalid COHORT_REGISTRY_HOME value "${pathValue}". Use an absolute path or "~/" prefix.`
  );
}

function toAbsolutePath(pathValue: string): string {
  return isAbsolute(pathValue) ? pathValue : resolve(pathValue);
}

export function resolveRegistryHomePathFromEnv(
  env: StoragePathEnv,
  osHome?: string
): string {
  const configured = normalize(env.COHORT_REGISTRY_HOME);
  if (configured) {
    return toAbsolutePath(expandTilde(configured, env, osHome));
  }

  return join(resolveSystemHomeDirectory(env, osHome), DEFAULT_HOME_DIRNAME);
}

export function resolveRegistryHomePath(): string {
  return resolveRegistryHomePathFromEnv(process.env);
}

export function resolveRegistryDbPath(): string {
  return join(resolveRegistryHomePath(), 'registry.db');
}

export function resolveRegistryConfigPath(): string {
  return join(resolveRegistryHomePath(), 'config.yaml');
}
