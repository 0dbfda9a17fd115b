/**
 * Config loading and defaults for the cohort registry.
 *
 * Config is a YAML file at COHORT_REGISTRY_HOME/config.yaml.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { RegistryConfig } from './types';
import {
  resolveRegistryHomePath,
  resolveRegistryDbPath,
  resolveRegistryConfigPath,
} from '../storage-paths';

export type { RegistryConfig } from './types';

const SUPPORTED_VERSIONS = ['1.0', '1'];

const DEFAULT_CONFIG: RegistryConfig = {
  version: '1.0',
  jobs: {
    strictTransitions: true,
  },
  exports: {
    defaultOrgUnit: '/Programs/Volunteers',
  },
};

const CONFIG_COMMENT = `# Cohort Registry Configuration
#
# jobs.strictTransitions
#   true: a job that reached complete, cancelled or error keeps that status.
#   false: any status may follow any other (useful when replaying worker runs).
#
# exports.defaultOrgUnit
#   Workspace org unit recorded on an export receipt when the exporter
#   does not name one.
`;

const configFileSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(value => String(value)),
  jobs: z
    .object({
      strictTransitions: z.boolean().optional(),
    })
    .optional(),
  exports: z
    .object({
      defaultOrgUnit: z.string().trim().min(1).optional(),
    })
    .optional(),
});

let _config: RegistryConfig | null = null;

export function getHomePath(): string {
  return resolveRegistryHomePath();
}

export function getDbPath(): string {
  return resolveRegistryDbPath();
}

export function getConfigPath(): string {
  return resolveRegistryConfigPath();
}

export function getDefaultConfig(): RegistryConfig {
  return {
    version: DEFAULT_CONFIG.version,
    jobs: { ...DEFAULT_CONFIG.jobs },
    exports: { ...DEFAULT_CONFIG.exports },
  };
}

export function generateDefaultConfig(): string {
  const yamlContent = stringifyYaml(DEFAULT_CONFIG);
  return CONFIG_COMMENT + yamlContent;
}

export function writeDefaultConfig(configPath: string): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, generateDefaultConfig(), 'utf-8');
}

export function loadConfig(configPath?: string): RegistryConfig {
  const path = configPath ?? getConfigPath();

  if (!existsSync(path)) {
    return getDefaultConfig();
  }

  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = parseYaml(raw);

  if (!parsed || typeof parsed !== 'object') {
    throw new Error(`Invalid config file at ${path}: expected YAML object`);
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new Error(`Invalid config file at ${path}: ${key}: ${issue?.message ?? 'invalid value'}`);
  }

  const config = result.data;
  if (!SUPPORTED_VERSIONS.includes(config.version)) {
    throw new Error(`Unsupported config version: ${config.version}. Expected '1.0'.`);
  }

  return {
    version: '1.0',
    jobs: {
      strictTransitions: config.jobs?.strictTransitions ?? DEFAULT_CONFIG.jobs.strictTransitions,
    },
    exports: {
      defaultOrgUnit: config.exports?.defaultOrgUnit ?? DEFAULT_CONFIG.exports.defaultOrgUnit,
    },
  };
}

export function initConfig(config?: RegistryConfig): void {
  _config = config ?? loadConfig();
}

export function getConfig(): RegistryConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Reset loaded config (for testing).
 */
export function resetConfig(): void {
  _config = null;
}
