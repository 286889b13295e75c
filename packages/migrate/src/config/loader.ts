import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@snakify/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Partial<ConfigInput>; // CLI flags
  cwd?: string; // Directory holding the project config
  homeDir?: string;
}

export const USER_CONFIG_DIR = '.snakify';
export const PROJECT_CONFIG_FILE = '.snakify.yaml';

// Replaced whole by a later layer, never merged key by key
const REPLACED_KEYS = new Set(['extensions']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];

      if (
        !REPLACED_KEYS.has(key) &&
        isPlainObject(sourceValue) &&
        isPlainObject(targetValue)
      ) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays, primitives and extension maps replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.snakify/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_DIR, 'config.yaml'));

    // 2. Project config: <cwd>/.snakify.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: Record<string, unknown> = { ...options.flags };

    // Merge in order of precedence: flags > explicit > project > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
