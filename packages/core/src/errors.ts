/**
 * Error types shared by every cratedoc package
 *
 * Unsupported input and configuration errors abort an extraction run.
 * A missing item is only recovered from while resolving a type's link target.
 */

/**
 * Base class for all cratedoc errors
 */
export class CratedocError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A construct outside the supported rendering grammar: an item kind, type
 * variant, generic argument, binding or trait bound modifier that cratedoc
 * refuses to approximate.
 */
export class UnsupportedInputError extends CratedocError {
  /** Short name of the construct, e.g. `type qualified_path` */
  readonly construct: string;

  constructor(construct: string, detail?: string) {
    super(`Unsupported ${construct}${detail ? `: ${detail}` : ''}`);
    this.construct = construct;
  }
}

/**
 * An item id that is absent from the loaded rustdoc documents
 */
export class MissingItemError extends CratedocError {
  readonly packageName: string;
  readonly itemId: string;

  constructor(packageName: string, itemId: string, reason = 'not found') {
    super(`Item ${itemId} in package '${packageName}' ${reason}`);
    this.packageName = packageName;
    this.itemId = itemId;
  }
}

/**
 * Malformed or inconsistent configuration
 */
export class ConfigError extends CratedocError {
  /** Individual validation failures, when there are several */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.issues = issues;
  }
}

/**
 * A rustdoc JSON document that does not have the expected shape
 */
export class RustdocFormatError extends CratedocError {
  /** JSON location of the offending value, e.g. `index["0:12"].inner` */
  readonly location: string;

  constructor(location: string, expected: string) {
    super(`Invalid rustdoc JSON at ${location}: expected ${expected}`);
    this.location = location;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
