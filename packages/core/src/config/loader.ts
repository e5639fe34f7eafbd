import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@mender/shared';
import { findRepoRoot } from '@mender/repo';

export const USER_CONFIG_DIR = '.mender';
export const REPO_CONFIG_FILE = '.mender.yaml';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Repository root (for repo config)
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: Config;
  repoRoot: string;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the repository around `cwd` and loads its configuration.
 */
export async function loadProjectConfig(
  options: Omit<ConfigOptions, 'cwd'> & { cwd?: string } = {},
): Promise<LoadedConfig> {
  const repoRoot = await findRepoRoot(options.cwd);
  const config = ConfigLoader.load({ ...options, cwd: repoRoot });
  return { config, repoRoot };
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping at the top level: ${filePath}`);
    }
    return parsed;
  }

  /**
   * Deep merge where nested mappings merge, arrays and primitives replace, and
   * `undefined` in `source` leaves `target` alone.
   */
  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;
      const targetValue = output[key];
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue) ? this.mergeConfigs(targetValue, sourceValue) : sourceValue;
    }
    return output;
  }

  /**
   * `MENDER_ORACLE` selects the default oracle, `MENDER_MAX_ATTEMPTS` the attempts per file.
   */
  static envOverrides(env: NodeJS.ProcessEnv): ConfigRecord {
    const overrides: ConfigRecord = {};
    if (env.MENDER_ORACLE) {
      overrides.defaults = { oracle: env.MENDER_ORACLE };
    }
    if (env.MENDER_MAX_ATTEMPTS) {
      const maxAttempts = Number(env.MENDER_MAX_ATTEMPTS);
      if (!Number.isInteger(maxAttempts)) {
        throw new ConfigError(`MENDER_MAX_ATTEMPTS must be an integer, got '${env.MENDER_MAX_ATTEMPTS}'`);
      }
      overrides.remediation = { maxAttempts };
    }
    return overrides;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.mender/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml'));

    // 2. Repo config: <repoRoot>/.mender.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. Environment, 5. CLI flags
    const envConfig = this.envOverrides(env);
    const flagConfig: ConfigRecord = isRecord(options.flags) ? options.flags : {};

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, { cause: result.error });
    }

    const config = result.data;

    // Resolve `api_key_env` against the given environment
    for (const providerConfig of Object.values(config.providers)) {
      if (providerConfig.api_key_env && !providerConfig.api_key) {
        const fromEnv = env[providerConfig.api_key_env];
        if (fromEnv) {
          providerConfig.api_key = fromEnv;
        }
      }
    }

    return config;
  }
}
