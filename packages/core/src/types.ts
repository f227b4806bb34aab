/**
 * One unit of extraction work as written in the configuration file
 */
export interface PackageConfig {
  /** Cargo package name (e.g., 'serde_json') */
  name: string;
  /** Module path prefix filter using `::` separators (e.g., 'serde_json::value') */
  modulePath?: string;
  /** Item kind to extract, as rustdoc names it (e.g., 'function', 'struct') */
  kind: string;
  /** Prebuilt rustdoc JSON document; built with cargo when omitted */
  json?: string;
}

/**
 * Contents of cratedoc.json
 */
export interface CratedocConfig {
  /** Path to Cargo.toml used when a package has to be built */
  manifestPath?: string;
  /** Root directory of the generated Markdown tree */
  outputPath: string;
  /** Write a SUMMARY.md navigation page */
  summary?: boolean;
  /** Cargo toolchain used to build rustdoc JSON (defaults to 'nightly') */
  toolchain?: string;
  /** Build with `--all-features` (defaults to true) */
  allFeatures?: boolean;
  /** Export selections, processed in order */
  packages: PackageConfig[];
}

/**
 * Result of validating a configuration
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
