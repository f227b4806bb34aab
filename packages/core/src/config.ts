import fs from 'fs-extra';
import path from 'node:path';
import { ConfigError, errorMessage } from './errors.js';
import type { CratedocConfig, PackageConfig, ValidationResult } from './types.js';

/**
 * File name looked up when no configuration path is given
 */
export const DEFAULT_CONFIG_FILE = 'cratedoc.json';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(object: JsonObject, key: string): string | undefined {
  const value = object[key];
  return typeof value === 'string' ? value : undefined;
}

function optionalBoolean(object: JsonObject, key: string): boolean | undefined {
  const value = object[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Checks the shape of a raw configuration value
 *
 * Checks for:
 * - A non-empty `outputPath`
 * - Types of the optional top-level fields
 * - At least one package, each with a name and a kind
 * - Known kinds, when `isKnownKind` is given
 *
 * @returns List of problems, empty when the configuration is usable
 */
export function validateConfig(raw: unknown, isKnownKind?: (kind: string) => boolean): string[] {
  if (!isObject(raw)) {
    return ['Configuration must be a JSON object'];
  }

  const errors: string[] = [];

  if (typeof raw.outputPath !== 'string' || raw.outputPath.length === 0) {
    errors.push('Missing outputPath');
  }

  for (const key of ['manifestPath', 'toolchain']) {
    if (raw[key] !== undefined && typeof raw[key] !== 'string') {
      errors.push(`${key} must be a string`);
    }
  }

  for (const key of ['summary', 'allFeatures']) {
    if (raw[key] !== undefined && typeof raw[key] !== 'boolean') {
      errors.push(`${key} must be a boolean`);
    }
  }

  if (!Array.isArray(raw.packages) || raw.packages.length === 0) {
    errors.push('No packages defined');
    return errors;
  }

  raw.packages.forEach((pkg: unknown, index: number) => {
    const where = `packages[${index}]`;

    if (!isObject(pkg)) {
      errors.push(`${where} must be an object`);
      return;
    }

    if (typeof pkg.name !== 'string' || pkg.name.length === 0) {
      errors.push(`${where} is missing a name`);
    }

    if (typeof pkg.kind !== 'string' || pkg.kind.length === 0) {
      errors.push(`${where} is missing a kind`);
    } else if (isKnownKind && !isKnownKind(pkg.kind)) {
      errors.push(`${where} has unknown kind '${pkg.kind}'`);
    }

    for (const key of ['modulePath', 'json']) {
      if (pkg[key] !== undefined && typeof pkg[key] !== 'string') {
        errors.push(`${where}.${key} must be a string`);
      }
    }
  });

  return errors;
}

/**
 * Validates a raw configuration value and turns it into a CratedocConfig
 *
 * Relative file paths are resolved against `baseDir`.
 *
 * @throws ConfigError listing every problem found
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): CratedocConfig {
  const errors = validateConfig(raw);
  if (errors.length > 0 || !isObject(raw) || !Array.isArray(raw.packages)) {
    throw new ConfigError('Invalid configuration', errors);
  }

  const packages: PackageConfig[] = raw.packages.filter(isObject).map((pkg) => {
    const parsed: PackageConfig = {
      name: String(pkg.name),
      kind: String(pkg.kind),
    };

    const modulePath = optionalString(pkg, 'modulePath');
    if (modulePath !== undefined) {
      parsed.modulePath = modulePath;
    }

    const json = optionalString(pkg, 'json');
    if (json !== undefined) {
      parsed.json = path.resolve(baseDir, json);
    }

    return parsed;
  });

  const config: CratedocConfig = {
    outputPath: path.resolve(baseDir, String(raw.outputPath)),
    packages,
  };

  const manifestPath = optionalString(raw, 'manifestPath');
  if (manifestPath !== undefined) {
    config.manifestPath = path.resolve(baseDir, manifestPath);
  }

  const toolchain = optionalString(raw, 'toolchain');
  if (toolchain !== undefined) {
    config.toolchain = toolchain;
  }

  const summary = optionalBoolean(raw, 'summary');
  if (summary !== undefined) {
    config.summary = summary;
  }

  const allFeatures = optionalBoolean(raw, 'allFeatures');
  if (allFeatures !== undefined) {
    config.allFeatures = allFeatures;
  }

  return config;
}

/**
 * Loads and validates cratedoc.json
 *
 * The configuration is cached after the first successful load.
 */
export class ConfigManager {
  private config: CratedocConfig | null = null;
  readonly configPath: string;

  /**
   * @param configPath - Path to the configuration file, relative to the working directory
   */
  constructor(configPath: string = DEFAULT_CONFIG_FILE) {
    this.configPath = path.resolve(configPath);
  }

  async exists(): Promise<boolean> {
    return fs.pathExists(this.configPath);
  }

  /**
   * Loads the configuration from disk
   *
   * @throws ConfigError if the file cannot be read, parsed or validated
   */
  async load(): Promise<CratedocConfig> {
    if (this.config) {
      return this.config;
    }

    const raw = await this.readRaw();
    this.config = parseConfig(raw, path.dirname(this.configPath));
    return this.config;
  }

  /**
   * Validates the configuration file without throwing
   *
   * @param isKnownKind - Optional predicate rejecting unknown item kinds
   */
  async validate(isKnownKind?: (kind: string) => boolean): Promise<ValidationResult> {
    let raw: unknown;
    try {
      raw = await this.readRaw();
    } catch (error) {
      return { valid: false, errors: [errorMessage(error)] };
    }

    const errors = validateConfig(raw, isKnownKind);
    return { valid: errors.length === 0, errors };
  }

  private async readRaw(): Promise<unknown> {
    try {
      const raw: unknown = await fs.readJson(this.configPath);
      return raw;
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${this.configPath}: ${errorMessage(error)}`);
    }
  }
}
