/**
 * Rustdoc JSON loader
 * Reads prebuilt documents from disk or builds them with cargo
 */

import fs from 'fs-extra'
import path from 'node:path'
import { execa } from 'execa'
import { CratedocError, errorMessage } from '@cratedoc/core'
import { parseCrate } from './parser.js'
import type { Crate } from './types.js'

/**
 * Options for building a package's rustdoc JSON with cargo
 */
export interface BuildOptions {
  /** Cargo package name */
  packageName: string
  /** Path to Cargo.toml (default: 'Cargo.toml') */
  manifestPath?: string
  /** Toolchain passed as `+<toolchain>` (default: 'nightly') */
  toolchain?: string
  /** Enable every cargo feature (default: true) */
  allFeatures?: boolean
}

interface CargoTarget {
  name: string
  kind: string[]
}

interface CargoPackage {
  name: string
  targets: CargoTarget[]
}

/**
 * Read and parse a rustdoc JSON document
 */
export async function loadCrate(jsonPath: string): Promise<Crate> {
  let json: unknown
  try {
    json = await fs.readJson(jsonPath)
  } catch (error) {
    throw new CratedocError(`Failed to read rustdoc JSON from ${jsonPath}: ${errorMessage(error)}`)
  }
  return parseCrate(json)
}

function isCargoPackage(value: unknown): value is CargoPackage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'targets' in value &&
    Array.isArray(value.targets)
  )
}

/**
 * Resolve the target directory and library target name from `cargo metadata`
 */
async function locateOutput(
  manifestPath: string,
  packageName: string
): Promise<{ targetDir: string; libName: string }> {
  const { stdout } = await execa('cargo', [
    'metadata',
    '--format-version',
    '1',
    '--no-deps',
    '--manifest-path',
    manifestPath,
  ])

  const metadata: unknown = JSON.parse(stdout)
  if (
    typeof metadata !== 'object' ||
    metadata === null ||
    !('target_directory' in metadata) ||
    typeof metadata.target_directory !== 'string' ||
    !('packages' in metadata) ||
    !Array.isArray(metadata.packages)
  ) {
    throw new CratedocError('Unexpected output from cargo metadata')
  }

  const pkg = metadata.packages.filter(isCargoPackage).find((p) => p.name === packageName)
  if (!pkg) {
    throw new CratedocError(`Package '${packageName}' not found in ${manifestPath}`)
  }

  // The document is named after the library target, which cargo spells with underscores
  const lib = pkg.targets.find((t) => t.kind.includes('lib') || t.kind.includes('proc-macro'))
  const libName = (lib?.name ?? packageName).replace(/-/g, '_')

  return { targetDir: metadata.target_directory, libName }
}

/**
 * Build rustdoc JSON for a package with cargo
 *
 * Runs `cargo +<toolchain> rustdoc ... -- -Z unstable-options --output-format json`
 *
 * @returns Path to the generated JSON document
 */
export async function buildRustdocJson(options: BuildOptions): Promise<string> {
  const manifestPath = path.resolve(options.manifestPath ?? 'Cargo.toml')
  const toolchain = options.toolchain ?? 'nightly'

  const args = [
    `+${toolchain}`,
    'rustdoc',
    '--manifest-path',
    manifestPath,
    '--package',
    options.packageName,
    '--lib',
  ]
  if (options.allFeatures ?? true) {
    args.push('--all-features')
  }
  args.push('--', '-Z', 'unstable-options', '--output-format', 'json')

  try {
    await execa('cargo', args)
  } catch (error) {
    throw new CratedocError(`Failed to build rustdoc JSON for '${options.packageName}': ${errorMessage(error)}`)
  }

  const { targetDir, libName } = await locateOutput(manifestPath, options.packageName)
  return path.join(targetDir, 'doc', `${libName}.json`)
}
