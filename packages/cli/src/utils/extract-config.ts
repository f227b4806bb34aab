import path from 'node:path';
import { ConfigManager } from '@cratedoc/core';
import type { CratedocConfig } from '@cratedoc/core';

/**
 * Flags of `cratedoc extract` that shape the configuration
 */
export interface ExtractFlags {
  config?: string;
  output?: string;
  package?: string;
  'module-path'?: string;
  kind: string;
  json?: string;
  'manifest-path'?: string;
  summary?: boolean;
}

/**
 * Build a configuration from command-line flags alone
 *
 * Paths resolve against the working directory; the output defaults to `./docs`.
 */
export function configFromFlags(packageName: string, flags: ExtractFlags): CratedocConfig {
  const config: CratedocConfig = {
    outputPath: path.resolve(flags.output ?? './docs'),
    packages: [{ name: packageName, kind: flags.kind }],
  };

  const [pkg] = config.packages;
  if (pkg && flags['module-path']) {
    pkg.modulePath = flags['module-path'];
  }
  if (pkg && flags.json) {
    pkg.json = path.resolve(flags.json);
  }
  if (flags['manifest-path']) {
    config.manifestPath = path.resolve(flags['manifest-path']);
  }
  if (flags.summary !== undefined) {
    config.summary = flags.summary;
  }

  return config;
}

/**
 * Resolve the configuration of an extraction run
 *
 * With `--package` the flags describe the whole run. Otherwise the config file
 * is loaded and `--output`, `--manifest-path` and `--summary` override it.
 */
export async function resolveExtractConfig(flags: ExtractFlags): Promise<CratedocConfig> {
  if (flags.package) {
    return configFromFlags(flags.package, flags);
  }

  const loaded = await new ConfigManager(flags.config).load();
  const config: CratedocConfig = { ...loaded };

  if (flags.output) {
    config.outputPath = path.resolve(flags.output);
  }
  if (flags['manifest-path']) {
    config.manifestPath = path.resolve(flags['manifest-path']);
  }
  if (flags.summary !== undefined) {
    config.summary = flags.summary;
  }

  return config;
}
