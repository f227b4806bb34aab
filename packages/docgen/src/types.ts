/**
 * Types for Markdown documentation generation
 */

import type { ItemKind } from '@cratedoc/rustdoc';

/**
 * One unit of extraction work, resolved from configuration
 */
export interface ExportSelection {
  /** Package whose document is searched */
  packageName: string;
  /** Module path prefix (e.g., ['demo', 'shapes']) */
  modulePath?: string[];
  /** Kind of the selected items */
  kind: ItemKind;
}

/**
 * Options for a generation run
 */
export interface GenerateOptions {
  /** Render pages without writing them */
  dryRun?: boolean;
  /** Receives a message for each step of the run */
  onProgress?: (message: string) => void;
}

/**
 * Generated page information
 */
export interface GeneratedPage {
  /** File path relative to the output directory, `/`-separated */
  path: string;
  /** Page title */
  title: string;
  /** Markdown content */
  content: string;
}

/**
 * SUMMARY.md navigation item
 */
export interface SummaryItem {
  /** Link text */
  title: string;
  /** File path */
  path?: string;
  /** Children items (for nested navigation) */
  children: SummaryItem[];
}
